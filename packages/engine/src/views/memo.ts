/**
 * Caches the result for the most recent arguments. A call whose arguments are all identical
 * (`Object.is`) to the previous call's returns the previous result instance.
 */
export const memoizeLast = <TArgs extends unknown[], TResult>(
  compute: (...args: TArgs) => TResult
): ((...args: TArgs) => TResult) => {
  let cached: { args: TArgs; result: TResult } | null = null;
  return (...args: TArgs): TResult => {
    if (
      cached &&
      cached.args.length === args.length &&
      cached.args.every((value, index) => Object.is(value, args[index]))
    ) {
      return cached.result;
    }
    const result = compute(...args);
    cached = { args, result };
    return result;
  };
};
