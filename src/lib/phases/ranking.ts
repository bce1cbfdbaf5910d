/**
 * Ranking phase: deviation files, RMS rankings, best-of lists and per-pose
 * summaries, all regenerated from the ledgers.
 */

import type { RankingInput } from '@/lib/ranking';
import { buildRankingReport, writeRankingReport } from '@/lib/ranking';
import type { PhaseResult, RunPhaseDefinition } from '@/lib/pipeline-types';
import type { WorkspacePaths } from '@/lib/paths';
import { writePoseSummaries } from '@/lib/resultOrganizer';
import { checkAborted } from '@/lib/errors';

export function rankScores(input: RankingInput, paths: WorkspacePaths): PhaseResult {
  const report = buildRankingReport(input);
  writeRankingReport(report, paths);
  const summaries = writePoseSummaries(report, paths);

  console.log(
    `[Rank] ${report.poses.length} poses ranked against ${report.references.length} references ` +
      `over ${report.targets.length} targets`,
  );

  return {
    phaseId: 'ranking',
    summary: `Ranked ${report.poses.length} poses; ${summaries} summaries written`,
    data: { poses: report.poses.length, references: report.references.length },
  };
}

export const rankingPhase: RunPhaseDefinition = {
  id: 'ranking',
  name: 'Ranking',
  description: 'Rank poses by their deviation from each reference ligand',

  execute: async (ctx) => {
    checkAborted(ctx.abortSignal);
    ctx.onProgress(0, 'Ranking poses');
    const result = rankScores(
      {
        references: ctx.catalog.references.map((r) => r.name),
        targets: ctx.catalog.targets.map((t) => t.name),
        ledger: ctx.ledger,
      },
      ctx.paths,
    );
    ctx.onProgress(100);
    return result;
  },
};
