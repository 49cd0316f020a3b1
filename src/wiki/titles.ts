export const Namespace = {
  MAIN: 0,
  TALK: 1,
  USER: 2,
  PROJECT: 4,
  FILE: 6,
  MEDIAWIKI: 8,
  TEMPLATE: 10,
  HELP: 12,
  CATEGORY: 14,
} as const;

const NAMESPACE_PREFIXES: Record<string, number> = {
  talk: Namespace.TALK,
  user: Namespace.USER,
  project: Namespace.PROJECT,
  file: Namespace.FILE,
  image: Namespace.FILE,
  mediawiki: Namespace.MEDIAWIKI,
  template: Namespace.TEMPLATE,
  help: Namespace.HELP,
  category: Namespace.CATEGORY,
};

// Characters that can never appear in a page title
const ILLEGAL_TITLE_CHARS = /[#<>[\]|{}\u0000-\u001f\u007f]/;

export interface PageTitle {
  namespace: number;
  dbKey: string;           // Underscored form, first letter upper-cased
}

function toDbKey(text: string): string | null {
  const key = text.trim().replace(/[\s_]+/g, '_').replace(/^_+|_+$/g, '');
  if (key === '' || ILLEGAL_TITLE_CHARS.test(key)) {
    return null;
  }
  return key.charAt(0).toUpperCase() + key.slice(1);
}

/**
 * Parses "File:Some image.jpg" style text. Unknown prefixes stay part of a main-namespace title.
 */
export function parseTitle(text: string, defaultNamespace: number = Namespace.MAIN): PageTitle | null {
  let namespace = defaultNamespace;
  let rest = text.trim().replace(/^:/, '');

  const colon = rest.indexOf(':');
  if (colon > 0) {
    const prefix = rest.slice(0, colon).trim().toLowerCase();
    const prefixed = NAMESPACE_PREFIXES[prefix];
    if (prefixed !== undefined) {
      namespace = prefixed;
      rest = rest.slice(colon + 1);
    }
  }

  const dbKey = toDbKey(rest);
  return dbKey ? { namespace, dbKey } : null;
}

/**
 * Turns link text such as "bad image.png" or "File:Bad image.png" into the
 * file key images are recorded under ("Bad_image.png"); null when it is not a valid title.
 */
export function normalizeFileKey(text: string): string | null {
  const title = parseTitle(text, Namespace.FILE);
  if (!title || title.namespace !== Namespace.FILE) {
    return null;
  }
  return title.dbKey;
}

const CANONICAL_NAMES: Record<number, string> = {
  [Namespace.TALK]: 'Talk',
  [Namespace.USER]: 'User',
  [Namespace.PROJECT]: 'Project',
  [Namespace.FILE]: 'File',
  [Namespace.MEDIAWIKI]: 'MediaWiki',
  [Namespace.TEMPLATE]: 'Template',
  [Namespace.HELP]: 'Help',
  [Namespace.CATEGORY]: 'Category',
};

export function formatTitle(title: PageTitle): string {
  const text = title.dbKey.replace(/_/g, ' ');
  const prefix = CANONICAL_NAMES[title.namespace];
  return prefix ? `${prefix}:${text}` : text;
}
