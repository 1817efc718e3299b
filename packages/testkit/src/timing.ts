/**
 * Yields to the real event loop a few times so pending promise chains settle.
 * Uses setImmediate, which the bridge tests leave unfaked.
 */
export async function flushAsync(rounds = 5): Promise<void> {
  for (let round = 0; round < rounds; round += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
