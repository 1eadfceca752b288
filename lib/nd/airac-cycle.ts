import { AIRAC_CYCLE_DAYS, AIRAC_EPOCH } from '@/lib/constants';

const DAY_MS = 24 * 60 * 60 * 1000;
const CYCLE_MS = AIRAC_CYCLE_DAYS * DAY_MS;

/** An AIRAC cycle as published, e.g. 2501 = year 25, cycle 1. */
export interface AiracCycle {
  readonly year: number;
  readonly cycle: number;
}

export type CycleValidity = 'future' | 'effective' | 'expired';

export function airacCycle(year: number, cycle: number): AiracCycle {
  return { year, cycle };
}

function fullYear(year: number): number {
  return year < 100 ? 2000 + year : year;
}

export function cycleEffectiveDate(cycle: AiracCycle): Date {
  const yearStart = Date.UTC(fullYear(cycle.year), 0, 1);
  const cyclesSinceEpoch = Math.ceil((yearStart - AIRAC_EPOCH) / CYCLE_MS);
  const firstOfYear = AIRAC_EPOCH + cyclesSinceEpoch * CYCLE_MS;
  return new Date(firstOfYear + (cycle.cycle - 1) * CYCLE_MS);
}

export function cycleValidity(cycle: AiracCycle, at: Date = new Date()): CycleValidity {
  const effective = cycleEffectiveDate(cycle).getTime();
  const now = at.getTime();
  if (now < effective) return 'future';
  if (now < effective + CYCLE_MS) return 'effective';
  return 'expired';
}

export function compareAiracCycles(a: AiracCycle, b: AiracCycle): number {
  return fullYear(a.year) - fullYear(b.year) || a.cycle - b.cycle;
}

export function formatAiracCycle(cycle: AiracCycle): string {
  const year = fullYear(cycle.year) - 2000;
  return `${String(year).padStart(2, '0')}${String(cycle.cycle).padStart(2, '0')}`;
}

