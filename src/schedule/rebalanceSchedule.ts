import { RebalanceEvent, RebalanceFrequency } from '../core/types';
import { monthIndex, monthKey, weekKey } from '../core/time';

export const frequencyLabel = (frequency: RebalanceFrequency): string =>
  typeof frequency === 'string' ? frequency : `custom:${frequency.months}`;

const periodKey = (date: string, frequency: RebalanceFrequency, anchorMonth: number): string => {
  if (frequency === 'weekly') return weekKey(date);
  if (frequency === 'monthly') return monthKey(date);
  const block = Math.floor((monthIndex(monthKey(date)) - anchorMonth) / frequency.months);
  return `block-${block}`;
};

/**
 * One event per week / month / N-month block present in `dates`. The
 * rebalance date is the first trading date of the block and the holding
 * period runs until the trading date before the next rebalance.
 */
export const buildRebalanceSchedule = (dates: string[], frequency: RebalanceFrequency): RebalanceEvent[] => {
  if (!dates.length) return [];
  const anchorMonth = monthIndex(monthKey(dates[0]));
  const starts: number[] = [];
  let lastKey: string | undefined;
  dates.forEach((date, i) => {
    const key = periodKey(date, frequency, anchorMonth);
    if (key !== lastKey) {
      starts.push(i);
      lastKey = key;
    }
  });
  return starts.map((startIdx, n) => {
    const endIdx = n + 1 < starts.length ? starts[n + 1] - 1 : dates.length - 1;
    return {
      rebalanceDate: dates[startIdx],
      periodStart: dates[startIdx],
      periodEnd: dates[endIdx]
    };
  });
};

// Gaps or overlaps between consecutive holding periods, in date order.
export const scheduleGaps = (events: RebalanceEvent[], dates: string[]): Array<{ after: string; before: string }> => {
  const gaps: Array<{ after: string; before: string }> = [];
  for (let i = 1; i < events.length; i++) {
    const prevEnd = dates.indexOf(events[i - 1].periodEnd);
    const nextStart = dates.indexOf(events[i].periodStart);
    if (prevEnd < 0 || nextStart < 0 || nextStart !== prevEnd + 1) {
      gaps.push({ after: events[i - 1].periodEnd, before: events[i].periodStart });
    }
  }
  return gaps;
};
