import { CatalogError } from '../../utils/errors.js';
import { STYLE_DEFINITIONS } from './definitions.js';

export const STYLE_IDS = [
  'pun',
  'wordplay',
  'observational',
  'anti-humor',
  'question-answer',
  'one-liner',
  'knock-knock',
  'classic',
] as const;

export type StyleId = (typeof STYLE_IDS)[number];

export const DEFAULT_STYLE_ID: StyleId = 'classic';

export interface StyleDefinition {
  readonly id: StyleId;
  /** Name used in the persona preamble, e.g. "knock-knock" or "question-and-answer". */
  readonly name: string;
  readonly description: string;
  /** The comedic technique the writer should apply. */
  readonly technique: string;
  /** Structural instruction appended to the closing rules. */
  readonly format: string;
}

export interface StyleCatalog {
  readonly defaultStyle: StyleDefinition;
  listStyles(): readonly StyleDefinition[];
  /** Never throws: blank or unknown identifiers resolve to the default style. */
  resolveStyle(identifier?: string | null): StyleDefinition;
  /** Exact lookup after trim + lowercase; undefined when the identifier is unknown. */
  findStyle(identifier: string): StyleDefinition | undefined;
}

export function normalizeStyleId(identifier: string): string {
  return identifier.trim().toLowerCase();
}

/**
 * Build an immutable catalog. Definitions keep the order they are given in,
 * which is the presentation order for listings.
 */
export function createStyleCatalog(
  definitions: readonly StyleDefinition[],
  defaultId: string = DEFAULT_STYLE_ID,
): StyleCatalog {
  const byId = new Map<string, StyleDefinition>();

  for (const def of definitions) {
    if (byId.has(def.id)) {
      throw new CatalogError(`Duplicate style identifier: ${def.id}`, { id: def.id });
    }
    if (!def.technique.trim()) {
      throw new CatalogError(`Style "${def.id}" has an empty technique fragment`, { id: def.id });
    }
    if (!def.format.trim()) {
      throw new CatalogError(`Style "${def.id}" has an empty format fragment`, { id: def.id });
    }
    if (!def.name.trim()) {
      throw new CatalogError(`Style "${def.id}" has an empty display name`, { id: def.id });
    }
    if (!def.description.trim()) {
      throw new CatalogError(`Style "${def.id}" has an empty description`, { id: def.id });
    }
    byId.set(def.id, Object.freeze({ ...def }));
  }

  const defaultStyle = byId.get(defaultId);
  if (!defaultStyle) {
    throw new CatalogError(`Default style "${defaultId}" is not in the catalog`, {
      defaultId,
      available: [...byId.keys()],
    });
  }

  const ordered = Object.freeze([...byId.values()]);

  const findStyle = (identifier: string): StyleDefinition | undefined =>
    byId.get(normalizeStyleId(identifier));

  return Object.freeze({
    defaultStyle,
    listStyles: () => ordered,
    findStyle,
    resolveStyle(identifier?: string | null): StyleDefinition {
      if (identifier == null || !identifier.trim()) return defaultStyle;
      return findStyle(identifier) ?? defaultStyle;
    },
  });
}

export const styleCatalog: StyleCatalog = createStyleCatalog(STYLE_DEFINITIONS);

export const listStyles = (): readonly StyleDefinition[] => styleCatalog.listStyles();

export const resolveStyle = (identifier?: string | null): StyleDefinition =>
  styleCatalog.resolveStyle(identifier);
