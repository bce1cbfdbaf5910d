/**
 * Command line entry point.
 *
 *   pose-rank [run] [--root DIR] [--debug] [--clear-cache | --clear-everything]
 *   pose-rank rank [--root DIR]
 *   pose-rank hits <ranked-file> (--top N | --range=MIN,MAX) [--out DIR] [--target NAME]
 *   pose-rank intersect <file>:<filter> <file>:<filter> ... [--out FILE]
 */

import { parseArgs } from 'node:util';
import path from 'node:path';
import { loadRunConfig } from '@/lib/config';
import { ConfigError, DockingError, formatErrorMessage } from '@/lib/errors';
import { writeFileAtomic } from '@/lib/fsUtils';
import {
  collectHitStructures,
  formatIntersection,
  intersectHits,
  parseFilteredFile,
  rangeFilter,
  readHits,
  topFilter,
  type HitFilter,
} from '@/lib/hits';
import { createWorkspacePaths } from '@/lib/paths';
import { installSignalHandlers, runDocking, runRanking } from '@/lib/runner';

const USAGE = `Usage:
  pose-rank [run] [--root DIR] [--debug] [--clear-cache | --clear-everything]
  pose-rank rank [--root DIR]
  pose-rank hits <ranked-file> (--top N | --range=MIN,MAX) [--out DIR] [--target NAME]
  pose-rank intersect <file>:top=N|range=MIN,MAX ... [--out FILE]`;

const OPTIONS = {
  root: { type: 'string' },
  debug: { type: 'boolean', default: false },
  'clear-cache': { type: 'boolean', default: false },
  'clear-everything': { type: 'boolean', default: false },
  top: { type: 'string' },
  range: { type: 'string' },
  out: { type: 'string' },
  target: { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const [command = 'run', ...rest] = positionals;

  switch (command) {
    case 'run': {
      if (values['clear-cache'] && values['clear-everything']) {
        throw new ConfigError('Use either --clear-cache or --clear-everything, not both');
      }
      const config = loadRunConfig(process.env, { root: values.root, debug: values.debug });
      const controller = new AbortController();
      const removeHandlers = installSignalHandlers(controller);
      try {
        // An interrupted run is not a failure
        await runDocking({
          config,
          clearCache: values['clear-cache'],
          clearEverything: values['clear-everything'],
          signal: controller.signal,
          display: process.stdout.isTTY === true,
        });
        return 0;
      } finally {
        removeHandlers();
      }
    }

    case 'rank': {
      const config = loadRunConfig(process.env, { root: values.root, debug: values.debug });
      const result = runRanking(config);
      console.log(`[Rank] ${result.summary}`);
      return 0;
    }

    case 'hits': {
      const [file] = rest;
      if (!file) throw new ConfigError(`Missing ranked file\n${USAGE}`);

      let filter: HitFilter;
      if (values.top !== undefined) {
        filter = topFilter(values.top);
      } else if (values.range !== undefined) {
        const bounds = values.range.split(',');
        if (bounds.length !== 2) throw new ConfigError('--range takes MIN,MAX');
        filter = rangeFilter(bounds[0], bounds[1]);
      } else {
        throw new ConfigError('Specify --top N or --range=MIN,MAX');
      }

      const hits = readHits(file, filter);
      for (const hit of hits) {
        console.log(`${hit.value} ${hit.name}`);
      }

      if (values.out) {
        const config = loadRunConfig(process.env, { root: values.root });
        const paths = createWorkspacePaths(config.root);
        collectHitStructures(
          hits.map((h) => h.name),
          paths.dockedDir,
          path.resolve(values.out),
          values.target,
        );
      }
      return 0;
    }

    case 'intersect': {
      if (rest.length < 2) throw new ConfigError(`intersect needs at least two filtered files\n${USAGE}`);
      const sources = rest.map(parseFilteredFile);
      const names = intersectHits(sources.map((s) => readHits(s.file, s.filter)));
      const content = formatIntersection(names, sources);

      if (values.out) {
        writeFileAtomic(path.resolve(values.out), content);
        console.log(`[Rank] ${names.length} common names written to ${values.out}`);
      } else {
        process.stdout.write(content);
      }
      return 0;
    }

    default:
      throw new ConfigError(`Unknown command '${command}'\n${USAGE}`);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof DockingError) {
      console.error(`[Session] ${err.name}: ${err.message}`);
      process.exitCode = err.exitCode;
      return;
    }
    console.error(`[Session] Unexpected error: ${formatErrorMessage(err)}`);
    process.exitCode = 1;
  });
