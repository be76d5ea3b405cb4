/**
 * Serializes async sections. Each `runExclusive` callback starts only after
 * every earlier one has settled, so a load → mutate → persist sequence cannot
 * interleave with another.
 */
export class Mutex {
  private chain: Promise<void> = Promise.resolve();

  runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const next = this.chain.then(operation);

    // a rejected section must not wedge the ones queued behind it
    this.chain = next.then(
      () => undefined,
      () => undefined
    );

    return next;
  }
}
