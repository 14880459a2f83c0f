import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import type { DatasetName, IntegrityIssue, VerseKey } from './types.js';
import { MalformedKeyError, SchemaError } from './errors.js';
import { compareVerseKeys, formatVerseKey, parseVerseKey, tryParseVerseKey } from './verse-key.js';

/**
 * Commentary entries may point at another verse's entry instead of carrying
 * text. A chain visits at most this many entries (the verse itself included).
 */
export const MAX_REFERENCE_DEPTH = 3;

// References are short ("114:6"); anything longer is commentary text
const MAX_REFERENCE_LENGTH = 9;

const rawSourceSchema = z.record(z.string(), z.unknown());

const arabicRecordSchema = z.object({
  id: z.number().int().optional(),
  verse_key: z.string().optional(),
  surah: z.number().int().optional(),
  ayah: z.number().int().optional(),
  text: z.string().min(1)
});

const translationRecordSchema = z.union([
  z.string(),
  z.object({ t: z.string() }),
  z.object({ text: z.string() })
]);

const commentaryRecordSchema = z.union([
  z.string(),
  z.object({ text: z.string() })
]);

/**
 * One verse of the anchor (Arabic) dataset
 */
export interface ArabicFragment {
  key: VerseKey;
  verseKey: string;
  text: string;
}

/**
 * Commentary for one verse after cross-references are followed.
 * `text` is still raw markup; the index sanitizes it.
 */
export interface CommentaryFragment {
  text: string;
  /** Key of the entry the text came from */
  sourceKey: string;
}

/**
 * Fragments parsed from one dataset, keyed by canonical verse key
 */
export interface ParsedSource<T> {
  entries: Map<string, T>;
  issues: IntegrityIssue[];
}

/**
 * All three datasets, parsed, plus every issue met on the way
 */
export interface DatasetFragments {
  arabic: Map<string, ArabicFragment>;
  translation: Map<string, string>;
  commentary: Map<string, CommentaryFragment>;
  issues: IntegrityIssue[];
}

/**
 * File names of the three datasets, relative to the data directory
 */
export interface DatasetFiles {
  arabic: string;
  translation: string;
  commentary: string;
}

/**
 * Options for loading datasets from disk
 */
export interface LoadOptions {
  /** Directory holding the JSON files */
  dataDir: string;
  files: DatasetFiles;
}

/**
 * Raw JSON values of the three datasets, not yet validated
 */
export interface RawSources {
  arabic: unknown;
  translation: unknown;
  commentary: unknown;
}

function issue(dataset: DatasetName, verseKey: string, kind: IntegrityIssue['kind'], message: string): IntegrityIssue {
  return { dataset, verseKey, kind, message };
}

function describeZodError(err: z.ZodError): string {
  return err.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

/**
 * Validate that a non-anchor source is a key/record object. Anything else
 * becomes an issue and an empty source.
 */
function asRecordObject(dataset: DatasetName, raw: unknown, issues: IntegrityIssue[]): Record<string, unknown> {
  const parsed = rawSourceSchema.safeParse(raw);
  if (!parsed.success) {
    issues.push(issue(dataset, '*', 'schema', `${dataset} dataset is not a key/record object`));
    return {};
  }
  return parsed.data;
}

/**
 * Parse the anchor dataset. Every problem here is fatal: the anchor defines
 * which verses exist.
 */
export function parseArabicSource(raw: unknown): ParsedSource<ArabicFragment> {
  const source = rawSourceSchema.safeParse(raw);
  if (!source.success) {
    throw new SchemaError('Arabic dataset is not a key/record object');
  }

  const rawKeys = Object.keys(source.data);
  if (rawKeys.length === 0) {
    throw new SchemaError('Arabic dataset is empty');
  }

  const entries = new Map<string, ArabicFragment>();
  const issues: IntegrityIssue[] = [];

  for (const rawKey of rawKeys) {
    const key = parseVerseKey(rawKey);
    const verseKey = formatVerseKey(key);

    const record = arabicRecordSchema.safeParse(source.data[rawKey]);
    if (!record.success) {
      throw new SchemaError(`Arabic record ${rawKey}: ${describeZodError(record.error)}`, verseKey);
    }

    const { verse_key, surah, ayah, text } = record.data;
    if (verse_key !== undefined) {
      const declared = tryParseVerseKey(verse_key);
      if (!declared || compareVerseKeys(declared, key) !== 0) {
        throw new SchemaError(`Arabic record ${rawKey} declares verse_key "${verse_key}"`, verseKey);
      }
    }
    if ((surah !== undefined && surah !== key.surah) || (ayah !== undefined && ayah !== key.ayah)) {
      throw new SchemaError(`Arabic record ${rawKey} declares surah/ayah ${surah}:${ayah}`, verseKey);
    }

    if (entries.has(verseKey)) {
      // Two raw keys normalizing to the same verse ("2:7" and "02:07"); keep the first
      issues.push(issue('arabic', verseKey, 'duplicate', `Duplicate verse key ${rawKey} (already loaded as ${verseKey})`));
      continue;
    }
    entries.set(verseKey, { key, verseKey, text });
  }

  return { entries, issues };
}

/**
 * Parse a key of a non-anchor dataset; malformed keys become issues.
 */
function parseSecondaryKey(dataset: DatasetName, rawKey: string, issues: IntegrityIssue[]): string | null {
  try {
    return formatVerseKey(parseVerseKey(rawKey));
  } catch (err) {
    if (!(err instanceof MalformedKeyError)) throw err;
    issues.push(issue(dataset, rawKey, 'malformed-key', err.message));
    return null;
  }
}

function translationText(record: z.infer<typeof translationRecordSchema>): string {
  if (typeof record === 'string') return record;
  return 't' in record ? record.t : record.text;
}

/**
 * Parse the translation dataset. Records are a string or { t } (or { text }).
 */
export function parseTranslationSource(raw: unknown): ParsedSource<string> {
  const issues: IntegrityIssue[] = [];
  const source = asRecordObject('translation', raw, issues);
  const entries = new Map<string, string>();

  for (const [rawKey, value] of Object.entries(source)) {
    const verseKey = parseSecondaryKey('translation', rawKey, issues);
    if (verseKey === null) continue;

    const record = translationRecordSchema.safeParse(value);
    if (!record.success) {
      issues.push(issue('translation', verseKey, 'schema', `Translation record ${rawKey} has no text`));
      continue;
    }
    if (entries.has(verseKey)) {
      issues.push(issue('translation', verseKey, 'duplicate', `Duplicate verse key ${rawKey}`));
      continue;
    }
    entries.set(verseKey, translationText(record.data));
  }

  return { entries, issues };
}

/**
 * A string value that is a verse key rather than commentary text
 */
function referenceTarget(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed.length > MAX_REFERENCE_LENGTH) return null;
  const key = tryParseVerseKey(trimmed);
  return key ? formatVerseKey(key) : null;
}

function resolveReference(
  verseKey: string,
  direct: Map<string, string>,
  references: Map<string, string>
): CommentaryFragment | string {
  const seen = new Set([verseKey]);
  let current = verseKey;

  for (let depth = 0; depth < MAX_REFERENCE_DEPTH; depth++) {
    const text = direct.get(current);
    if (text !== undefined) {
      return { text, sourceKey: current };
    }
    const target = references.get(current);
    if (target === undefined) {
      return `Commentary for ${verseKey} refers to ${current}, which has no commentary entry`;
    }
    if (seen.has(target)) {
      return `Commentary for ${verseKey} has a reference cycle through ${target}`;
    }
    seen.add(target);
    current = target;
  }

  return `Commentary for ${verseKey} has a reference chain longer than ${MAX_REFERENCE_DEPTH} entries`;
}

/**
 * Parse the commentary dataset. Records are { text } or a string; a string
 * that is itself a verse key shares that verse's commentary.
 */
export function parseCommentarySource(raw: unknown): ParsedSource<CommentaryFragment> {
  const issues: IntegrityIssue[] = [];
  const source = asRecordObject('commentary', raw, issues);
  const direct = new Map<string, string>();
  const references = new Map<string, string>();

  for (const [rawKey, value] of Object.entries(source)) {
    const verseKey = parseSecondaryKey('commentary', rawKey, issues);
    if (verseKey === null) continue;

    const record = commentaryRecordSchema.safeParse(value);
    if (!record.success) {
      issues.push(issue('commentary', verseKey, 'schema', `Commentary record ${rawKey} has no text`));
      continue;
    }
    if (direct.has(verseKey) || references.has(verseKey)) {
      issues.push(issue('commentary', verseKey, 'duplicate', `Duplicate verse key ${rawKey}`));
      continue;
    }

    if (typeof record.data === 'string') {
      const target = referenceTarget(record.data);
      if (target !== null) {
        references.set(verseKey, target);
      } else {
        direct.set(verseKey, record.data);
      }
    } else {
      direct.set(verseKey, record.data.text);
    }
  }

  const entries = new Map<string, CommentaryFragment>();
  for (const [verseKey, text] of direct) {
    entries.set(verseKey, { text, sourceKey: verseKey });
  }
  for (const verseKey of references.keys()) {
    const resolved = resolveReference(verseKey, direct, references);
    if (typeof resolved === 'string') {
      issues.push(issue('commentary', verseKey, 'unresolved-reference', resolved));
    } else {
      entries.set(verseKey, resolved);
    }
  }

  return { entries, issues };
}

/**
 * Parse all three raw sources. Throws only for an unusable anchor dataset.
 */
export function parseDatasets(sources: RawSources): DatasetFragments {
  const arabic = parseArabicSource(sources.arabic);
  const translation = parseTranslationSource(sources.translation);
  const commentary = parseCommentarySource(sources.commentary);

  return {
    arabic: arabic.entries,
    translation: translation.entries,
    commentary: commentary.entries,
    issues: [...arabic.issues, ...translation.issues, ...commentary.issues]
  };
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const raw: unknown = await fs.readJson(filePath);
  return raw;
}

/**
 * Read the three dataset files. The Arabic file must exist and parse; the
 * other two degrade to an empty source with an issue.
 */
export async function readDatasetSources(options: LoadOptions): Promise<{ sources: RawSources; issues: IntegrityIssue[] }> {
  const { dataDir, files } = options;
  const issues: IntegrityIssue[] = [];

  const arabicPath = path.join(dataDir, files.arabic);
  let arabic: unknown;
  try {
    arabic = await readJsonFile(arabicPath);
  } catch (err) {
    throw new SchemaError(`Failed to read Arabic dataset ${arabicPath}: ${err}`);
  }

  async function readSecondary(dataset: DatasetName, fileName: string): Promise<unknown> {
    const filePath = path.join(dataDir, fileName);
    try {
      return await readJsonFile(filePath);
    } catch (err) {
      issues.push(issue(dataset, '*', 'schema', `Failed to read ${dataset} dataset ${filePath}: ${err}`));
      return {};
    }
  }

  const [translation, commentary] = await Promise.all([
    readSecondary('translation', files.translation),
    readSecondary('commentary', files.commentary)
  ]);

  return { sources: { arabic, translation, commentary }, issues };
}

/**
 * Read and parse all three datasets from disk
 */
export async function loadDatasets(options: LoadOptions): Promise<DatasetFragments> {
  const { sources, issues } = await readDatasetSources(options);
  const fragments = parseDatasets(sources);
  return { ...fragments, issues: [...issues, ...fragments.issues] };
}
