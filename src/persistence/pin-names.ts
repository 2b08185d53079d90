/**
 * GPIO pin labels used by the andon light towers
 */
export const PIN_NAMES: ReadonlyMap<number, string> = new Map([
  [23, 'Green'],
  [24, 'Yellow'],
  [25, 'Red'],
  [12, 'Load'],
]);

export function resolvePinName(pin: number): string {
  return PIN_NAMES.get(pin) ?? `Pin_${pin}`;
}
