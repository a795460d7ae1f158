/**
 * Optional collaborators are resolved once at initialization into either a
 * usable client or an explicit "unavailable" marker with the reason.
 */
export type Capability<T> =
  | { available: true; client: T }
  | { available: false; reason: string };

export function available<T>(client: T): Capability<T> {
  return { available: true, client };
}

export function unavailable<T>(reason: string): Capability<T> {
  return { available: false, reason };
}

export function describeCapability<T>(cap: Capability<T>): string {
  return cap.available ? 'available' : `unavailable (${cap.reason})`;
}
