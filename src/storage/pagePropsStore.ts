import { readJsonSafeAsync, writeJsonAtomic } from './jsonStore';

/** Page property holding the chosen image's file key. */
export const PAGE_IMAGE_PROP = 'page_image';

export interface PagePropsStore {
  getProperty(pageId: number, name: string): Promise<string | null>;
  getProperties(pageIds: readonly number[], name: string): Promise<Map<number, string>>;
  setProperty(pageId: number, name: string, value: string): Promise<void>;
  deleteProperty(pageId: number, name: string): Promise<void>;
}

type PropsTable = Record<string, Record<string, string>>;

function isPropsTable(data: unknown): data is PropsTable {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return false;
  }
  return Object.values(data).every(props =>
    typeof props === 'object'
    && props !== null
    && Object.values(props).every(value => typeof value === 'string')
  );
}

/**
 * Page properties kept in one JSON file: { "<pageId>": { "<name>": "<value>" } }.
 * Writes are serialized within the process.
 */
export class JsonPagePropsStore implements PagePropsStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  private read(): Promise<PropsTable> {
    return readJsonSafeAsync<PropsTable>(this.filePath, {}, isPropsTable);
  }

  private update(mutate: (table: PropsTable) => void): Promise<void> {
    const next = this.writeChain.then(async () => {
      const table = await this.read();
      mutate(table);
      await writeJsonAtomic(this.filePath, table);
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  async getProperty(pageId: number, name: string): Promise<string | null> {
    const table = await this.read();
    return table[String(pageId)]?.[name] ?? null;
  }

  async getProperties(pageIds: readonly number[], name: string): Promise<Map<number, string>> {
    const table = await this.read();
    const result = new Map<number, string>();
    for (const pageId of pageIds) {
      const value = table[String(pageId)]?.[name];
      if (value !== undefined) {
        result.set(pageId, value);
      }
    }
    return result;
  }

  setProperty(pageId: number, name: string, value: string): Promise<void> {
    return this.update(table => {
      table[String(pageId)] = { ...table[String(pageId)], [name]: value };
    });
  }

  deleteProperty(pageId: number, name: string): Promise<void> {
    return this.update(table => {
      const props = table[String(pageId)];
      if (!props) return;
      delete props[name];
      if (Object.keys(props).length === 0) {
        delete table[String(pageId)];
      }
    });
  }
}

export class MemoryPagePropsStore implements PagePropsStore {
  private readonly props = new Map<number, Map<string, string>>();

  async getProperty(pageId: number, name: string): Promise<string | null> {
    return this.props.get(pageId)?.get(name) ?? null;
  }

  async getProperties(pageIds: readonly number[], name: string): Promise<Map<number, string>> {
    const result = new Map<number, string>();
    for (const pageId of pageIds) {
      const value = this.props.get(pageId)?.get(name);
      if (value !== undefined) result.set(pageId, value);
    }
    return result;
  }

  async setProperty(pageId: number, name: string, value: string): Promise<void> {
    const props = this.props.get(pageId) ?? new Map<string, string>();
    props.set(name, value);
    this.props.set(pageId, props);
  }

  async deleteProperty(pageId: number, name: string): Promise<void> {
    this.props.get(pageId)?.delete(name);
  }
}
