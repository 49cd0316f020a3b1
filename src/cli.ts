#!/usr/bin/env node
import { Command } from 'commander';
import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { getConfig, parsePort } from './config/config';
import { createContext } from './context';
import { renderBodySchema } from './routes/pageImagesRoutes';
import { startServer } from './server';
import { MemoryPagePropsStore } from './storage/pagePropsStore';
import { handleError, withErrorHandling } from './utils/errorHandler';

const renderFileSchema = renderBodySchema.extend({
  pageId: z.number().int().positive(),
});

const program = new Command();

program
  .name('page-images')
  .description('Chooses a representative image for wiki pages and serves its thumbnail metadata')
  .version('1.0.0');

program
  .command('select')
  .description('score the image placements of one rendered page and show the chosen image')
  .argument('<placements>', 'JSON file with { pageId, namespace, title?, placements[] }')
  .option('--save', 'store the chosen image as the page_image property', false)
  .action(async (file: string, options: { save: boolean }) => {
    const parsed = renderFileSchema.safeParse(await fs.readJson(path.resolve(file)));
    if (!parsed.success) {
      console.error(`Error: ${file} is not a valid placements file: ${parsed.error.issues[0]?.message}`);
      process.exit(1);
    }

    const { pageId, namespace, title, placements } = parsed.data;
    const context = createContext(getConfig(), options.save ? {} : { pageProps: new MemoryPagePropsStore() });
    const document = { id: pageId, namespace, title };

    for (const placement of placements) {
      context.service.onImagePlacement(document, placement);
    }
    const records = context.service.peekRecords(pageId);
    const report = await context.service.evaluate(records);
    const chosen = await context.service.onRenderComplete(document);

    for (const usage of report.usages) {
      const { width, position, ratio, blacklisted, total } = usage.breakdown;
      const veto = blacklisted ? ' (blacklisted)' : '';
      console.log(`#${usage.ordinal} ${usage.imageId}: width=${width} position=${position} ratio=${ratio} total=${total}${veto}`);
    }
    console.log(chosen ? `Chosen: ${chosen}` : 'No suitable image');
  });

program
  .command('blacklist')
  .description('build (or load from cache) the image blacklist and print it')
  .action(withErrorHandling(async () => {
    const context = createContext(getConfig());
    const list = await context.blacklist.getBlacklist();
    for (const entry of Array.from(list).sort()) {
      console.log(entry);
    }
    console.error(`${list.size} blacklisted images`);
  }, 'blacklist'));

program
  .command('serve')
  .description('start the HTTP query server')
  .option('-p, --port <number>', 'port to listen on')
  .action(async (options: { port?: string }) => {
    const config = getConfig();
    const port = parsePort(options.port, config.server.port);
    await startServer(createContext(config), port);
  });

program.parseAsync().catch((error: unknown) => {
  handleError(error, 'cli');
  console.error('An unexpected error occurred:', error instanceof Error ? error.message : error);
  process.exit(1);
});
