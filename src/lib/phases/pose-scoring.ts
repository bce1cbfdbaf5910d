/**
 * Main phase: candidate ligands x poses x targets.
 */

import type { RunPhaseDefinition } from '@/lib/pipeline-types';
import { checkAborted } from '@/lib/errors';
import { extractPoses } from '@/lib/poseExtractor';
import { emptyCounts, runDockingTask, summarizeCounts } from './shared';

export const poseScoringPhase: RunPhaseDefinition = {
  id: 'pose-scoring',
  name: 'Pose scoring',
  description: 'Split each candidate into poses and dock every pose against every target',

  execute: async (ctx) => {
    const { session, config, paths, launcher } = ctx;
    const { candidates, targets } = ctx.catalog;
    const counts = emptyCounts();

    session.store.getState().setTotals({ ligand: candidates.length, target: targets.length });

    while (session.cursors.ligand < candidates.length) {
      checkAborted(ctx.abortSignal);
      const ligand = candidates[session.cursors.ligand];
      const poses = await extractPoses(ligand.file, {
        paths,
        splitter: config.splitter,
        launcher,
        signal: ctx.abortSignal,
      });
      session.store.getState().setTotals({ pose: poses.length });

      while (session.cursors.pose < poses.length) {
        const pose = poses[session.cursors.pose];

        while (session.cursors.target < targets.length) {
          checkAborted(ctx.abortSignal);
          const target = targets[session.cursors.target];
          const outcome = await runDockingTask(ctx, {
            name: pose.name,
            pose: pose.pose,
            ligandFile: pose.file,
            target,
          });
          counts[outcome.status]++;
          session.advance('target');
        }

        session.advance('pose');
      }

      session.advance('ligand');
    }

    return {
      phaseId: 'pose-scoring',
      summary: `Poses: ${summarizeCounts(counts)}`,
      data: counts,
    };
  },
};
