/**
 * Progressive Expansion
 *
 * Turns every expectation carrying a progressive policy into a ramp of
 * clones whose response delay grows by `step` up to `cap`. Each clone but
 * the last serves exactly one match; the last serves unlimited matches so
 * traffic after the ramp keeps getting the capped delay.
 *
 * Priorities are handed out in evaluation order: the originals first, in
 * their relative order, then each ramp by ascending delay.
 *
 * @module expectation/progressive
 */

import { createLogger } from '../utils/logger';
import { cloneExpectation } from './clone';
import type { Expectation, ProgressivePolicy } from './expectation-types';

const log = createLogger('progressive');

export function isValidProgressivePolicy(policy: ProgressivePolicy): boolean {
  return (
    policy.step > 0 &&
    policy.base >= 0 &&
    policy.cap >= policy.base
  );
}

/**
 * Delays a policy ramps through: base + step, base + 2*step, ... <= cap.
 */
export function progressiveDelays(policy: ProgressivePolicy): number[] {
  if (!isValidProgressivePolicy(policy)) return [];
  const delays: number[] = [];
  for (let delay = policy.base + policy.step; delay <= policy.cap; delay += policy.step) {
    delays.push(delay);
  }
  return delays;
}

function progressiveLabel(description: string | undefined, delay: number): string {
  return description
    ? `${description} [Progressive delay: ${delay} ms]`
    : `Progressive delay: ${delay} ms`;
}

/**
 * Expand a batch. Returns a new array holding the originals (with their
 * priorities raised where needed) followed by the generated clones.
 */
export function expandProgressive(expectations: Expectation[]): Expectation[] {
  let maxPriority = 0;
  for (const expectation of expectations) {
    if (expectation.priority > maxPriority) {
      maxPriority = expectation.priority;
    }
  }

  const output = [...expectations];
  let added = 0;

  for (const original of expectations) {
    maxPriority++;
    if (original.priority < maxPriority) {
      original.priority = maxPriority;
    }

    const policy = original.progressive;
    if (!policy || !isValidProgressivePolicy(policy)) continue;

    for (let delay = policy.base + policy.step; delay <= policy.cap; delay += policy.step) {
      const clone = cloneExpectation(original);
      // the ramp itself is not expanded again
      delete clone.progressive;

      clone.description = progressiveLabel(clone.description, delay);
      if (clone.id !== undefined) {
        clone.id = `${clone.id}-progressive-${delay}`;
      }

      clone.times = delay + policy.step <= policy.cap
        ? { unlimited: false, remainingTimes: 1 }
        : { unlimited: true };
      clone.httpResponse.delay = { timeUnit: 'MILLISECONDS', value: delay };

      maxPriority++;
      clone.priority = maxPriority;

      output.push(clone);
      added++;
    }
  }

  log.info('Extended expectations for progressive responses', { added, total: output.length });
  return output;
}
