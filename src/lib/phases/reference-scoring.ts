/**
 * Reference phase: dock every reference ligand against every target so the
 * ranking has a baseline score per target.
 */

import type { RunPhaseDefinition } from '@/lib/pipeline-types';
import { checkAborted } from '@/lib/errors';
import { emptyCounts, runDockingTask, summarizeCounts } from './shared';

export const referenceScoringPhase: RunPhaseDefinition = {
  id: 'reference-scoring',
  name: 'Reference scoring',
  description: 'Dock each reference ligand against each target',

  execute: async (ctx) => {
    const { session } = ctx;
    const { references, targets } = ctx.catalog;
    const counts = emptyCounts();

    session.store.getState().setTotals({ referenceLigand: references.length, referenceTarget: targets.length });

    while (session.cursors.referenceLigand < references.length) {
      const reference = references[session.cursors.referenceLigand];

      while (session.cursors.referenceTarget < targets.length) {
        checkAborted(ctx.abortSignal);
        const target = targets[session.cursors.referenceTarget];
        const outcome = await runDockingTask(ctx, {
          name: reference.name,
          pose: { ligand: reference.name },
          ligandFile: reference.file,
          target,
        });
        counts[outcome.status]++;
        session.advance('referenceTarget');
      }

      session.advance('referenceLigand');
    }

    return {
      phaseId: 'reference-scoring',
      summary: `References: ${summarizeCounts(counts)}`,
      data: counts,
    };
  },
};
