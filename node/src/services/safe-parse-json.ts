/**
 * Recovers structured records from tool and fetch responses.
 *
 * Graph responses are not always JSON: records can come back as a language-level
 * literal dump with single quotes, bare None/True/False, HTML-escaped text and
 * driver objects such as `neo4j.time.DateTime(2025, 10, 9, 12, 8, 29, 8740000)`.
 * Three strategies are tried in order and the first that yields an object wins:
 *
 * 1. strict JSON (markdown fences stripped)
 * 2. entity decode + line breaks to spaces + non-literal replacement + lenient JSON5 parse
 * 3. quote normalization of the sanitized text + strict JSON
 */
import { decodeHTML } from 'entities';
import JSON5 from 'json5';
import type { EntityId, ParseStrategy, Profile } from '@/types/orchestration';

/** Stands in for constructor calls that are not literals. */
export const NON_LITERAL_PLACEHOLDER = '<non-literal>';

export const DEFAULT_ID_FIELDS = ['person_id', 'id'] as const;

const LENIENT_KEYWORDS: Record<string, string> = {
  None: 'null',
  True: 'true',
  False: 'false',
  nan: 'NaN',
};

const STRICT_KEYWORDS: Record<string, string> = {
  None: 'null',
  True: 'true',
  False: 'false',
  nan: 'null',
  NaN: 'null',
};

export interface ParsedLiteral {
  value: object;
  strategy: ParseStrategy;
}

export function stripCodeFences(raw: string): string {
  let txt = raw.trim();
  if (!txt.startsWith('```')) return txt;

  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
    txt = txt.slice(firstNewline + 1, lastFence).trim();
  } else {
    txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
  }
  return txt;
}

const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[\w$.]/;

/** Index just past the closing quote of the string literal opening at `start`, or -1. */
function skipString(text: string, start: number): number {
  const quote = text[start];
  for (let i = start + 1; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === quote) return i + 1;
  }
  return -1;
}

/** Index just past the `)` balancing the `(` at `open`, or -1. */
function skipCall(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      const end = skipString(text, i);
      if (end === -1) return -1;
      i = end - 1;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/**
 * Rewrites bare tokens outside string literals: constructor calls become the
 * placeholder string, keywords are mapped through `keywords`.
 */
export function replaceNonLiterals(text: string, keywords: Record<string, string>): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      const end = skipString(text, i);
      if (end === -1) return out + text.slice(i);
      out += text.slice(i, end);
      i = end;
      continue;
    }
    if (IDENT_START.test(ch) && (i === 0 || !/[\w$.]/.test(text[i - 1]))) {
      let j = i + 1;
      while (j < text.length && IDENT_PART.test(text[j])) j++;
      const ident = text.slice(i, j);
      let k = j;
      while (k < text.length && (text[k] === ' ' || text[k] === '\t')) k++;
      if (text[k] === '(') {
        const end = skipCall(text, k);
        if (end !== -1) {
          out += JSON.stringify(NON_LITERAL_PLACEHOLDER);
          i = end;
          continue;
        }
      }
      out += Object.prototype.hasOwnProperty.call(keywords, ident) ? keywords[ident] : ident;
      i = j;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

function normalizeCurlyQuotes(text: string): string {
  return text.replace(/[“”„‟″]/g, '"').replace(/[‘’‚‛′]/g, "'");
}

function asObject(value: unknown): object | null {
  return typeof value === 'object' && value !== null ? value : null;
}

function tryParse(parse: () => unknown): object | null {
  try {
    return asObject(parse());
  } catch {
    return null;
  }
}

/** Parse a response into an object or array; null when every strategy fails. */
export function parseLiteral(raw: string): ParsedLiteral | null {
  const txt = stripCodeFences(raw);
  if (!txt) return null;

  const strict = tryParse(() => JSON.parse(txt));
  if (strict) return { value: strict, strategy: 1 };

  // raw line breaks are not allowed inside string literals
  const decoded = decodeHTML(txt).replace(/\r\n?|\n/g, ' ');
  const lenient = tryParse(() => JSON5.parse(replaceNonLiterals(decoded, LENIENT_KEYWORDS)));
  if (lenient) return { value: lenient, strategy: 2 };

  const requoted = replaceNonLiterals(normalizeCurlyQuotes(decoded), STRICT_KEYWORDS).replace(/'/g, '"');
  const normalized = tryParse(() => JSON.parse(requoted));
  if (normalized) return { value: normalized, strategy: 3 };

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEntityId(value: unknown): value is EntityId {
  return (typeof value === 'string' && value.length > 0) || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Parse one full-record response into a Profile. A list yields its first record.
 * The entity id is `entityId` when given, else the first of `idFields` present on the record.
 */
export function parseProfile(
  rawText: string,
  entityId?: EntityId,
  idFields: readonly string[] = DEFAULT_ID_FIELDS,
): Profile | null {
  const parsed = parseLiteral(rawText);
  if (!parsed) return null;

  const record = Array.isArray(parsed.value) ? parsed.value[0] : parsed.value;
  if (!isRecord(record)) return null;

  const id = entityId ?? idFields.map((f) => record[f]).find(isEntityId);
  if (id === undefined) return null;

  return {
    entityId: id,
    fields: record,
    parseStrategyUsed: parsed.strategy,
  };
}
