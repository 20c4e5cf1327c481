// ============================================================================
// @probekit/cli — Commands
// ============================================================================
// Commands:
//   probekit run <keys.txt> [--size 7] [--load 0.5] [--growth 2]
//                [--policy pack|mark] [--hash simple] [--secondary rs]
//                [--compaction rehash|stride] [--remove N] [--dump] [--verbose]
//   probekit hashes
//   probekit help
// ============================================================================

import { readFileSync } from 'node:fs';
import {
  HASH_NAMES,
  ProbeTable,
  ProbekitError,
  type Slot,
  hashFunctions,
  isHashName,
  setLogLevel,
  timer,
} from '@probekit/core';
import { z } from 'zod';

/** Output sinks, so commands can run against the console or a test buffer. */
export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const hashNameSchema = z
  .string()
  .refine(isHashName, { message: `Expected one of: ${HASH_NAMES.join(', ')}` });

const runOptionsSchema = z.object({
  size: z.coerce.number().default(7),
  load: z.coerce.number().default(0.5),
  growth: z.coerce.number().default(2),
  policy: z.enum(['pack', 'mark']).default('pack'),
  hash: hashNameSchema.default('simple'),
  secondary: hashNameSchema.optional(),
  compaction: z.enum(['rehash', 'stride']).default('rehash'),
  remove: z.coerce.number().int().min(0).default(0),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

const RUN_FLAGS = ['size', 'load', 'growth', 'policy', 'hash', 'secondary', 'compaction', 'remove'];

function getFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function row(label: string, value: string | number): string {
  return `  ${label.padEnd(14)}${value}`;
}

/**
 * Parse `--flag value` pairs for the run command.
 *
 * @throws ZodError when a flag has the wrong shape
 */
export function parseRunOptions(args: string[]): RunOptions {
  const raw: Record<string, string | undefined> = {};
  for (const name of RUN_FLAGS) {
    raw[name] = getFlag(args, name);
  }
  return runOptionsSchema.parse(raw);
}

/** Split a keys file into non-empty, trimmed lines. */
export function readKeys(path: string): string[] {
  return readFileSync(path, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** One line per slot: index, state, and key/value for live entries. */
export function formatSlots(slots: readonly Slot<number>[]): string[] {
  return slots.map((slot, index) => {
    const prefix = `  [${String(index).padStart(3)}]`;
    if (slot.state === 'OCCUPIED') return `${prefix} ${slot.state.padEnd(10)} ${slot.key} = ${slot.value}`;
    if (slot.state === 'DELETED') return `${prefix} ${slot.state.padEnd(10)} ${slot.key}`;
    return `${prefix} ${slot.state}`;
  });
}

function runWorkload(args: string[], io: CliIO): number {
  const file = args[1];
  if (!file || file.startsWith('--')) {
    io.err('Error: run needs a keys file. Usage: probekit run <keys.txt> [options]');
    return 1;
  }

  const options = parseRunOptions(args);
  if (hasFlag(args, 'verbose')) {
    setLogLevel('debug');
  }

  const keys = readKeys(file);
  const table = new ProbeTable<number>({
    initialTableSize: options.size,
    maxLoadFactor: options.load,
    growthFactor: options.growth,
    deletionPolicy: options.policy === 'mark' ? 'MARK' : 'PACK',
    compaction: options.compaction,
    primaryHash: hashFunctions[options.hash],
    secondaryHash: options.secondary ? hashFunctions[options.secondary] : undefined,
  });

  const t = timer(`run ${file}`);
  keys.forEach((key, i) => table.insert(key, i + 1));
  for (const key of keys) table.find(key);

  const toRemove = [...new Set(keys)].slice(0, options.remove);
  for (const key of toRemove) table.remove(key);
  t.endWith({ keys: keys.length, removed: toRemove.length });

  const stats = table.stats();
  io.out('');
  io.out(`  probekit run — ${file}`);
  io.out(row('Keys:', keys.length));
  io.out(row('Removed:', toRemove.length));
  io.out(row('Table size:', stats.tableSize));
  io.out(row('Count:', stats.count));
  io.out(row('Load factor:', stats.loadFactor.toFixed(4)));
  io.out(row('Probes:', stats.probes));
  io.out(row('Expansions:', stats.expansions));

  if (hasFlag(args, 'dump')) {
    io.out('');
    for (const line of formatSlots(table.slots())) io.out(line);
  }

  table.dispose();
  return 0;
}

function listHashes(io: CliIO): number {
  for (const name of HASH_NAMES) io.out(name);
  return 0;
}

function printUsage(io: CliIO): void {
  io.out(`
  probekit — open-addressing hash table workbench

  Usage:
    probekit run <keys.txt> [options]     Insert, find and remove keys, then print stats
    probekit hashes                       List the built-in hash functions

  Run options:
    --size N              Requested initial size (rounded up to a prime)   [7]
    --load F              Maximum load factor, 0 < F <= 1                  [0.5]
    --growth F            Growth factor, F > 1                             [2]
    --policy pack|mark    Deletion policy                                  [pack]
    --hash NAME           Primary hash                                     [simple]
    --secondary NAME      Secondary (stride) hash; omit for linear probing
    --compaction MODE     PACK compaction: rehash | stride                 [rehash]
    --remove N            Remove the first N distinct keys after loading   [0]
    --dump                Print every slot
    --verbose             Log resizes and timings

  Environment Variables:
    PROBEKIT_DEBUG=1      Same as --verbose
  `);
}

/**
 * Run one CLI invocation. Returns the process exit code.
 */
export function runCli(args: string[], io: CliIO): number {
  const command = args[0];

  try {
    switch (command) {
      case 'run':
        return runWorkload(args, io);
      case 'hashes':
        return listHashes(io);
      case 'help':
      case '--help':
        printUsage(io);
        return 0;
      default:
        printUsage(io);
        return 1;
    }
  } catch (e) {
    if (e instanceof z.ZodError) {
      for (const issue of e.issues) {
        io.err(`Error: --${issue.path.join('.')}: ${issue.message}`);
      }
      return 1;
    }
    if (e instanceof ProbekitError) {
      io.err(`Error [${e.kind}]: ${e.message}`);
      return 1;
    }
    io.err(`Error: ${errorMessage(e)}`);
    return 1;
  }
}
