import { ShortDoiExpansionError } from './errors';

/**
 * Resolves a shortDOI (`10/abcde`) to the full DOI it aliases (`10.1234/...`).
 * Implementations typically wrap a registry lookup; they throw on failure.
 */
export interface ShortDoiExpander {
  expand(shortDoi: string): string;
}

const unavailable: ShortDoiExpander = {
  expand(shortDoi: string): string {
    throw new ShortDoiExpansionError(shortDoi, `no short DOI expander configured; cannot expand ${shortDoi}`);
  }
};

let current: ShortDoiExpander = unavailable;
const listeners: Array<() => void> = [];

export function getShortDoiExpander(): ShortDoiExpander { return current; }

/** Bind an expander (or unbind with undefined). Memoized standardizations are invalidated. */
export function setShortDoiExpander(expander: ShortDoiExpander | undefined){
  current = expander ?? unavailable;
  for(const fn of listeners) fn();
}

export function onShortDoiExpanderChange(fn: () => void){ listeners.push(fn); }

/** Expander backed by a fixed lookup table (shortDOI -> DOI). */
export function createStaticShortDoiExpander(table: Record<string, string>): ShortDoiExpander {
  const lookup = new Map(Object.entries(table).map(([k, v]) => [k.toLowerCase(), v]));
  return {
    expand(shortDoi: string): string {
      const hit = lookup.get(shortDoi.toLowerCase());
      if(!hit) throw new ShortDoiExpansionError(shortDoi);
      return hit;
    }
  };
}
