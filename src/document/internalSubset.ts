import { InvalidDocumentError } from '../errors.js';

const DOCTYPE_WITH_SUBSET = /<!DOCTYPE\b([^[>]*)\[([\s\S]*?)\]\s*>/;
const GENERAL_ENTITY = /<!ENTITY\s+([A-Za-z_:][\w.:-]*)\s+(?:"([^"]*)"|'([^']*)')\s*>/g;
const ENTITY_REFERENCE = /&([A-Za-z_:][\w.:-]*);/g;

// Left for the parser to resolve
const PREDEFINED_ENTITIES = new Set(['amp', 'lt', 'gt', 'quot', 'apos']);

const MAX_EXPANSION = 1 << 20;

export interface ExpandedSource {
  /** Markup with the internal subset removed and its entities expanded */
  text: string;
  /** Internal subset as written between `[` and `]`, or null if there was none */
  subset: string | null;
}

function escapeQuotes(value: string): string {
  return value.replace(/"/g, '&quot;').replace(/'/g, '&apos;');
}

/**
 * Collect internal general entities, first declaration wins. Parameter
 * entities and external entities are skipped.
 */
function declarations(subset: string): Map<string, string> {
  const declared = new Map<string, string>();
  for (const match of subset.matchAll(GENERAL_ENTITY)) {
    const [, name, doubleQuoted, singleQuoted] = match;
    const value = doubleQuoted ?? singleQuoted;
    if (name === undefined || value === undefined) continue;
    if (PREDEFINED_ENTITIES.has(name) || declared.has(name)) continue;
    declared.set(name, value);
  }
  return declared;
}

/**
 * Expand the general entities a DOCTYPE internal subset declares, since the
 * DOM parser only knows the predefined XML entities. The DOCTYPE is kept
 * without its subset, which is returned separately so it can be written back.
 */
export function expandInternalSubset(text: string, source?: string): ExpandedSource {
  const match = DOCTYPE_WITH_SUBSET.exec(text);
  if (!match) {
    return { text, subset: null };
  }

  const [whole, head = '', subset = ''] = match;
  const declared = declarations(subset);
  const resolved = new Map<string, string>();

  const resolve = (name: string, literal: string, stack: readonly string[]): string => {
    const cached = resolved.get(name);
    if (cached !== undefined) return cached;
    if (stack.includes(name)) {
      throw new InvalidDocumentError(`entity ${name} refers to itself`, source);
    }

    const value = literal.replace(ENTITY_REFERENCE, (reference: string, inner: string) => {
      const innerLiteral = declared.get(inner);
      return innerLiteral === undefined ? reference : resolve(inner, innerLiteral, [...stack, name]);
    });
    if (value.length > MAX_EXPANSION) {
      throw new InvalidDocumentError(`entity ${name} expands past ${MAX_EXPANSION} characters`, source);
    }

    resolved.set(name, value);
    return value;
  };

  const body = text.slice(match.index + whole.length).replace(ENTITY_REFERENCE, (reference: string, name: string) => {
    const literal = declared.get(name);
    return literal === undefined ? reference : escapeQuotes(resolve(name, literal, []));
  });
  if (body.length > text.length + MAX_EXPANSION) {
    throw new InvalidDocumentError(`entity references expand past ${MAX_EXPANSION} characters`, source);
  }

  return {
    text: `${text.slice(0, match.index)}<!DOCTYPE${head.trimEnd()}>${body}`,
    subset,
  };
}

/**
 * Put an internal subset back into serialized markup
 */
export function restoreInternalSubset(xml: string, subset: string | null): string {
  if (subset === null) return xml;
  return xml.replace(/<!DOCTYPE[^>]*/, head => `${head} [${subset}]`);
}
