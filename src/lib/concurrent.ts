/**
 * Maps every item through an async function, with at most `numThreads` calls in flight.
 * Below two threads or two items there's nothing to gain, so this runs sequentially.
 * Results keep input order either way. The first failure rejects the whole call,
 * and no further items are started after it.
 */
export async function transformConcurrently<Tin, Tout>(
  items: Iterable<Tin>,
  numThreads: number,
  func: (item: Tin) => Promise<Tout>,
): Promise<Array<Tout>> {
  const inputs = Array.from(items);

  if (numThreads < 2 || inputs.length < 2) {
    const results = new Array<Tout>();
    for (const item of inputs) {
      results.push(await func(item));
    }
    return results;
  }

  const results = new Array<Tout>(inputs.length);
  let nextIndex = 0;
  let failed = false;
  async function worker() {
    // Once anything fails the result is lost anyway, so stop taking items
    while (!failed && nextIndex < inputs.length) {
      const idx = nextIndex++;
      try {
        results[idx] = await func(inputs[idx]);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  }

  const workerCount = Math.min(numThreads, inputs.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
