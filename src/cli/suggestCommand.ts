import { parseArgs } from 'util';
import { CFG } from '../config';
import { getCatalog, loadCatalogFile } from '../catalog';
import { select } from '../engine/select';
import { CatalogError } from '../errors';
import { formatMoodProfile, formatResult } from '../present/format';
import { MOODS, parseMood } from '../situation/mood';
import { parseTrust, TRUST_LEVELS, TRUST_PROFILES } from '../situation/trust';
import { contextFrom, situationTags, type Situation } from '../situation/tags';
import type { Catalog } from '../types';

export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CommandIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export const USAGE = `Usage: tears [--trust <${TRUST_LEVELS.join('|')}>] [--mood <name|1-6>] [--tag <tag>]...
             [--catalog <path>] [--limit <n>] [--json] [--moods]`;

export const SITUATION_HINT =
  'Showing general suggestions only. Pass --trust and --mood to say whether the person trusts you in this moment, and the mood they are in.';

function parseCommandArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      trust: { type: 'string' },
      mood: { type: 'string' },
      tag: { type: 'string', multiple: true },
      catalog: { type: 'string' },
      limit: { type: 'string' },
      json: { type: 'boolean', default: false },
      moods: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  }).values;
}

/** Runs the `tears` command and returns its exit code. */
export function runSuggest(argv: string[], io: CommandIO = consoleIO): number {
  let values: ReturnType<typeof parseCommandArgs>;
  try {
    values = parseCommandArgs(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    io.err(USAGE);
    return 2;
  }

  if (values.help) {
    io.out(USAGE);
    io.out('');
    io.out('Trust: does the person start conversations with you?');
    for (const trust of TRUST_LEVELS) {
      io.out(`  ${trust}: ${TRUST_PROFILES[trust].description}`);
    }
    return 0;
  }

  if (values.moods) {
    io.out(MOODS.map(formatMoodProfile).join('\n\n'));
    return 0;
  }

  const situation: Situation = {};
  if (values.trust !== undefined) {
    const trust = parseTrust(values.trust);
    if (!trust) {
      io.err(`Unknown trust level "${values.trust}" (expected ${TRUST_LEVELS.join(' or ')})`);
      return 2;
    }
    situation.trust = trust;
  }
  if (values.mood !== undefined) {
    const mood = parseMood(values.mood);
    if (!mood) {
      io.err(`Unknown mood "${values.mood}" (expected one of ${MOODS.join(', ')} or 1-6)`);
      return 2;
    }
    situation.mood = mood;
  }

  let limit = CFG.MAX_SUGGESTIONS_PER_POLARITY;
  if (values.limit !== undefined) {
    if (!/^\d+$/.test(values.limit)) {
      io.err(`--limit must be a non-negative integer, got "${values.limit}"`);
      return 2;
    }
    limit = Number(values.limit);
  }

  let catalog: Catalog;
  try {
    catalog = values.catalog !== undefined ? loadCatalogFile(values.catalog) : getCatalog();
  } catch (error) {
    if (!(error instanceof CatalogError)) throw error;
    io.err(`Could not load suggestions: ${error.message}`);
    for (const issue of error.issues) io.err(`  ${issue}`);
    return 1;
  }

  const context = contextFrom([...situationTags(situation), ...(values.tag ?? [])]);
  const result = select(catalog.items, context, { limit });

  if (values.json) {
    const summarize = (items: typeof result.do) => items.map(({ id, text }) => ({ id, text }));
    io.out(
      JSON.stringify(
        { context: [...context].sort(), do: summarize(result.do), dont: summarize(result.dont) },
        null,
        2
      )
    );
  } else {
    io.out(formatResult(result));
  }

  if (!situation.trust || !situation.mood) {
    io.err(SITUATION_HINT);
  }
  return 0;
}
