/**
 * Phase registry: the phases of a run, in execution order.
 */

import type { RunPhaseDefinition, RunPhaseId } from '@/lib/pipeline-types';
import { referenceScoringPhase } from './reference-scoring';
import { poseScoringPhase } from './pose-scoring';
import { rankingPhase } from './ranking';

/** All phases, keyed by ID. */
export const phases: Record<RunPhaseId, RunPhaseDefinition> = {
  'reference-scoring': referenceScoringPhase,
  'pose-scoring': poseScoringPhase,
  'ranking': rankingPhase,
};

/** Phases of a full run, in order. */
export const RUN_ORDER: readonly RunPhaseId[] = ['reference-scoring', 'pose-scoring', 'ranking'];

export function getPhase(id: RunPhaseId): RunPhaseDefinition {
  return phases[id];
}

export function getRunPhases(): RunPhaseDefinition[] {
  return RUN_ORDER.map(getPhase);
}

export { referenceScoringPhase, poseScoringPhase, rankingPhase };
