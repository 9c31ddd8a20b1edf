import { describe, it, expect } from 'vitest';
import { trainKey } from '../../src/automation/trains.js';
import { SearchCriteria } from '../../src/automation/types.js';
import { selectCandidates } from '../../src/worker/candidateSelector.js';
import { makeTrain } from '../helpers/fixtures.js';

const criteria: SearchCriteria = {
  departure: '서울',
  arrival: '부산',
  date: '20261120',
  hour: '08',
  seat: 'general',
  passengers: 1,
};

describe('selectCandidates', () => {
  const a = makeTrain({ trainNo: '101' });
  const b = makeTrain({ trainNo: '103', depTime: '090000', seats: { special: true } });
  const c = makeTrain({ trainNo: '105', depTime: '100000' });

  it('should keep backend order and drop trains without the wanted seat', () => {
    const { eligible, missingTargets } = selectCandidates([a, b, c], criteria, null);

    expect(eligible.map((t) => t.trainNo)).toEqual(['101', '105']);
    expect(missingTargets).toBe(0);
  });

  it('should accept either class for any', () => {
    const { eligible } = selectCandidates([a, b, c], { ...criteria, seat: 'any' }, null);

    expect(eligible.map((t) => t.trainNo)).toEqual(['101', '103', '105']);
  });

  it('should honor train number filters', () => {
    const { eligible } = selectCandidates([a, b, c], { ...criteria, trainNumbers: ['105'] }, null);

    expect(eligible.map((t) => t.trainNo)).toEqual(['105']);
  });

  it('should follow target order and count targets that disappeared', () => {
    const gone = makeTrain({ trainNo: '199' });

    const { eligible, missingTargets } = selectCandidates(
      [a, b, c],
      criteria,
      [trainKey(c), trainKey(gone), trainKey(a)]
    );

    expect(eligible.map((t) => t.trainNo)).toEqual(['105', '101']);
    expect(missingTargets).toBe(1);
  });

  it('should return nothing when no train has seats', () => {
    const soldOut = makeTrain({ trainNo: '107', seats: {} });

    expect(selectCandidates([soldOut], criteria, null).eligible).toEqual([]);
  });
});
