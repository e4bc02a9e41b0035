/**
 * Round-robins over the given sequences, one item from each per turn, dropping
 * a sequence from the rotation once it runs out. Inputs are pulled lazily.
 */
export function* interleave<T>(...sequences: Iterable<T>[]): Generator<T, void, undefined> {
  const iterators = sequences.map((sequence) => sequence[Symbol.iterator]());

  while (iterators.length > 0) {
    let index = 0;
    while (index < iterators.length) {
      const next = iterators[index].next();
      if (next.done) {
        iterators.splice(index, 1);
        continue;
      }

      yield next.value;
      index += 1;
    }
  }
}
