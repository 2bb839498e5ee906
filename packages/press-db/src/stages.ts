export const STAGES = ['capture', 'reduce', 'meta', 'claims', 'merge', 'publish'] as const;

export type StageName = (typeof STAGES)[number];

export function isStageName(value: string): value is StageName {
  return STAGES.some(stage => stage === value);
}

/** The stage whose artifact feeds `stage`, or null for the first stage. */
export function upstreamOf(stage: StageName): StageName | null {
  const index = STAGES.indexOf(stage);
  return index > 0 ? STAGES[index - 1] : null;
}

/** Every stage that runs before `stage`, in pipeline order. */
export function ancestorsOf(stage: StageName): StageName[] {
  return STAGES.slice(0, STAGES.indexOf(stage));
}
