import { hasSeat, matchesCriteria, trainKey } from '../automation/trains.js';
import { SearchCriteria, TrainCandidate } from '../automation/types.js';

export interface CycleSelection {
  /** Trains to try this cycle, in attempt order. */
  eligible: TrainCandidate[];
  /** Targets chosen up front that the backend did not return this time. */
  missingTargets: number;
}

/**
 * Pick the trains worth a reservation attempt from one search result.
 *
 * With `targets` (keys chosen once at the start of an interactive run) the
 * targets' order wins and other trains are ignored. Without them every
 * returned train is considered in backend order.
 */
export function selectCandidates(
  trains: readonly TrainCandidate[],
  criteria: SearchCriteria,
  targets: readonly string[] | null
): CycleSelection {
  let ordered: TrainCandidate[];
  let missingTargets = 0;

  if (targets) {
    const byKey = new Map(trains.map((train) => [trainKey(train), train]));
    ordered = [];
    for (const key of targets) {
      const train = byKey.get(key);
      if (train) {
        ordered.push(train);
      } else {
        missingTargets += 1;
      }
    }
  } else {
    ordered = [...trains];
  }

  const eligible = ordered.filter((train) => matchesCriteria(train, criteria) && hasSeat(train, criteria.seat));
  return { eligible, missingTargets };
}
