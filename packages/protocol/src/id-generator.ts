/**
 * Monotonic ID Generator
 *
 * Lexicographically sortable ids for correlation ids, queue entries and
 * connections.
 *
 * Format: [<kind>_]<timestamp-base36>-<counter-base36>-<nodeId>
 * Example: "c_lxyz5g8-0001-7d2a"
 */

export type IdKind = 'c' | 'q' | 'conn';

export class IdGenerator {
  private counter = 0;
  private readonly nodeId: string;
  private lastTs = 0;

  constructor(nodeId?: string) {
    // Process ID + random suffix keeps ids unique across relay restarts
    this.nodeId = nodeId ?? `${process.pid.toString(36)}${Math.random().toString(36).slice(2, 6)}`;
  }

  next(kind?: IdKind): string {
    const now = Date.now();

    // A clock step backwards must not reset the counter, or ids could repeat
    if (now > this.lastTs) {
      this.lastTs = now;
      this.counter = 0;
    }

    const ts = this.lastTs.toString(36);
    const seq = (this.counter++).toString(36).padStart(4, '0');
    const id = `${ts}-${seq}-${this.nodeId}`;
    return kind ? `${kind}_${id}` : id;
  }
}

export const idGen = new IdGenerator();

export function generateId(): string {
  return idGen.next();
}

export function generateCorrelationId(): string {
  return idGen.next('c');
}

export function generateEntryId(): string {
  return idGen.next('q');
}

export function generateConnectionId(): string {
  return idGen.next('conn');
}
