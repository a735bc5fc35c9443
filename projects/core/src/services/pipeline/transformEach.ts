/**
 * Secondary transform stage.
 */

export type UnitTransform = (unit: string, index: number) => Promise<string>;

export interface TransformedUnit {
  readonly index: number;
  readonly source: string;
  readonly text: string;
}

/**
 * Applies `transform` to each unit in arrival order.
 *
 * The next unit is not requested from upstream until the current transform
 * has resolved and its result has been handed to the consumer. A failing
 * transform ends the stage with that error; no unit is skipped.
 */
export async function* transformEach(
  units: AsyncIterable<string>,
  transform: UnitTransform
): AsyncGenerator<TransformedUnit, void, undefined> {
  let index = 0;
  for await (const unit of units) {
    const text = await transform(unit, index);
    yield { index, source: unit, text };
    index++;
  }
}

/**
 * Adapts a synchronous array to the async iterable the stage consumes.
 */
export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T, void, undefined> {
  for (const item of items) {
    yield item;
  }
}
