
export function isObject(val: unknown): val is Record<string, unknown> {
  return (
    (val !== null)
    && ((typeof val) === 'object')
  );
}

export function isNumber(val: unknown): val is number {
  if(typeof val !== 'number') {
    return false;
  }
  return !isNaN(val);
}

export function isPositiveInt(val: unknown): val is number {
  return (
    isNumber(val)
    && Number.isSafeInteger(val)
    && (val > 0)
  );
}

export function isString(val: unknown): val is string {
  return (typeof val) === 'string';
}
