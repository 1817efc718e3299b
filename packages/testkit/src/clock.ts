function parseInstant(isoTimestamp: string): number {
  const instant = new Date(isoTimestamp).getTime();

  if (Number.isNaN(instant)) {
    throw new Error(`Invalid ISO timestamp: ${isoTimestamp}`);
  }

  return instant;
}

export function fixedClock(isoTimestamp: string): () => Date {
  const fixedInstant = parseInstant(isoTimestamp);

  return () => new Date(fixedInstant);
}

export interface ManualClock {
  now: () => Date;
  advance(ms: number): void;
}

export function manualClock(isoTimestamp: string): ManualClock {
  let current = parseInstant(isoTimestamp);

  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    }
  };
}
