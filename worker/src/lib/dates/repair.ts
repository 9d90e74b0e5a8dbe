import type { Logger } from 'pino';
import type { DateTriple, DeadlinePolicy } from '../../types.js';

export interface RepairOptions {
  deadlinePolicy?: DeadlinePolicy;
  logger?: Logger;
}

function violatesPolicy(deadline: Date, eventStart: Date, policy: DeadlinePolicy): boolean {
  return policy === 'not-before-start' ? deadline < eventStart : deadline > eventStart;
}

/**
 * Make a merged date triple internally consistent:
 * - an end before the start is dropped, then a missing end takes the start;
 * - a deadline on the wrong side of the start is read as the two roles being
 *   mislabeled and they are swapped. This is a heuristic, not a proof.
 */
export function repairDateTriple(triple: DateTriple, options: RepairOptions = {}): DateTriple {
  const policy = options.deadlinePolicy ?? 'not-before-start';
  let { deadline, eventStart, eventEnd } = triple;

  if (eventStart && eventEnd && eventEnd < eventStart) {
    eventEnd = null;
  }

  if (eventStart && !eventEnd) {
    eventEnd = eventStart;
  }

  if (deadline && eventStart && violatesPolicy(deadline, eventStart, policy)) {
    options.logger?.warn(
      { deadline: deadline.toISOString(), eventStart: eventStart.toISOString(), policy },
      'Deadline and event start look mislabeled, swapping',
    );
    [deadline, eventStart] = [eventStart, deadline];
    // a later start may now overtake the end
    if (eventEnd && eventEnd < eventStart) {
      eventEnd = eventStart;
    }
  }

  return { deadline, eventStart, eventEnd };
}
