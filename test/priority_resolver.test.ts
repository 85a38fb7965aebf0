import { expect } from 'chai';

import {
  PRIORITY_LEVELS,
  activePriority,
  createPriorityArray,
  isSimulationPermitted,
  isValidPriority,
  resolvePriorityArray,
} from '../lib/priorityResolver';

describe('priority resolver', () => {
  it('creates sixteen empty slots', () => {
    const slots = createPriorityArray<number>();
    expect(slots).to.have.length(PRIORITY_LEVELS);
    expect(slots.every((slot) => slot === null)).to.equal(true);
  });

  it('falls back to the relinquish default when every slot is empty', () => {
    expect(resolvePriorityArray(createPriorityArray<number>(), 50)).to.deep.equal({ value: 50, priority: null });
  });

  it('takes the lowest numbered non-empty slot', () => {
    const slots = createPriorityArray<number>();
    slots[15] = 40;
    slots[7] = 75;
    slots[11] = 60;
    expect(resolvePriorityArray(slots, 50)).to.deep.equal({ value: 75, priority: 8 });
    expect(activePriority(slots)).to.equal(8);
  });

  it('keeps falsy values as real commands', () => {
    const slots = createPriorityArray<number | boolean>();
    slots[4] = false;
    slots[9] = true;
    expect(resolvePriorityArray(slots, true)).to.deep.equal({ value: false, priority: 5 });

    const numeric = createPriorityArray<number>();
    numeric[0] = 0;
    expect(resolvePriorityArray(numeric, 10)).to.deep.equal({ value: 0, priority: 1 });
  });

  it('validates priorities', () => {
    expect(isValidPriority(1)).to.equal(true);
    expect(isValidPriority(16)).to.equal(true);
    expect(isValidPriority(0)).to.equal(false);
    expect(isValidPriority(17)).to.equal(false);
    expect(isValidPriority(2.5)).to.equal(false);
    expect(isValidPriority(Number.NaN)).to.equal(false);
  });

  it('permits simulation only while slots 1-15 are empty', () => {
    const slots = createPriorityArray<number>();
    expect(isSimulationPermitted(slots, true)).to.equal(true);

    slots[15] = 12;
    expect(isSimulationPermitted(slots, true)).to.equal(true);

    slots[14] = 30;
    expect(isSimulationPermitted(slots, true)).to.equal(false);

    slots[14] = null;
    slots[0] = 1;
    expect(isSimulationPermitted(slots, true)).to.equal(false);
  });

  it('always permits inputs and legacy mode', () => {
    const slots = createPriorityArray<number>();
    slots[2] = 5;
    expect(isSimulationPermitted(null, true)).to.equal(true);
    expect(isSimulationPermitted(slots, false)).to.equal(true);
  });
});
