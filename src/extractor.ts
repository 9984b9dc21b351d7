// Identifier extraction over a corpus of text units, plus corpus discovery on disk

import { readdirSync, readFileSync } from "node:fs";
import { join, relative, sep } from "node:path";
import type { Dirent } from "node:fs";
import type { Corpus, Extraction, IdentifierKind } from "./model.js";
import { IDENTIFIER_KINDS, emptyGroups, findIdentifiers } from "./identifiers.js";
import { silentLogger, type Logger } from "./log.js";

export interface CorpusOptions {
  extensions?: readonly string[];
  exclude?: readonly string[];
  logger?: Logger;
}

/**
 * Scan every text unit for identifiers of all six kinds.
 * Each match is recorded; repetition within a unit collapses to presence.
 * The result is built locally and shares no state with other calls.
 */
export function extractIdentifiers(corpus: Corpus): Extraction {
  const ids = emptyGroups();
  const occurrences = new Map<string, Set<string>>();

  for (const [path, text] of corpus) {
    for (const kind of IDENTIFIER_KINDS) {
      for (const id of findIdentifiers(text, kind)) {
        ids[kind].add(id);
        let units = occurrences.get(id);
        if (!units) {
          units = new Set<string>();
          occurrences.set(id, units);
        }
        units.add(path);
      }
    }
  }

  return { ids, occurrences };
}

export function identifiersOfKind(
  extraction: Extraction,
  kind: IdentifierKind
): string[] {
  return [...extraction.ids[kind]].sort();
}

// --- Corpus loading ---

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Read a text unit, or undefined when it cannot be read or is not valid UTF-8.
 */
export function readTextUnit(
  filePath: string,
  logger: Logger = silentLogger
): string | undefined {
  try {
    return strictUtf8.decode(readFileSync(filePath));
  } catch (err) {
    logger.debug(
      `skipping ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
    return undefined;
  }
}

function listFiles(
  dir: string,
  exclude: ReadonlySet<string>,
  logger: Logger
): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    logger.debug(
      `skipping directory ${dir}: ${err instanceof Error ? err.message : String(err)}`
    );
    return [];
  }
  const files: string[] = [];
  for (const entry of entries) {
    if (exclude.has(entry.name)) continue;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(fullPath, exclude, logger));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

export function toCorpusPath(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join("/");
}

/**
 * Load every matching file under root into a corpus keyed by root-relative path.
 * Unreadable files are left out; the scan always completes.
 */
export function loadCorpus(root: string, options: CorpusOptions = {}): Corpus {
  const {
    extensions = [".md"],
    exclude = ["node_modules", "reports", ".git", "build"],
    logger = silentLogger,
  } = options;

  const files = listFiles(root, new Set(exclude), logger)
    .filter((f) => extensions.some((ext) => f.endsWith(ext)))
    .map((f) => [toCorpusPath(root, f), f] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const corpus = new Map<string, string>();
  for (const [unitPath, fullPath] of files) {
    const text = readTextUnit(fullPath, logger);
    if (text !== undefined) corpus.set(unitPath, text);
  }
  logger.debug(`loaded ${corpus.size} of ${files.length} text units from ${root}`);
  return corpus;
}
