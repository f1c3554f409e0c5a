import type { Constraint, ConstraintName, ConstraintSource } from "../types.js";
import { clamp01 } from "../math.js";

/**
 * Constraints active for one evaluation pass, keyed by name and kept in
 * insertion order so downstream output is deterministic.
 */
export class ActiveConstraints {
  private readonly byName = new Map<ConstraintName, Constraint>();

  static from(constraints: Iterable<Constraint>): ActiveConstraints {
    const active = new ActiveConstraints();
    for (const c of constraints) {
      active.add(c.name, c.severity, c.description, c.source);
    }
    return active;
  }

  /** First write wins; a name is only expected once per pass. */
  add(name: ConstraintName, severity: number, description: string, source: ConstraintSource): void {
    if (this.byName.has(name)) return;
    this.byName.set(name, { name, severity: clamp01(severity), description, source });
  }

  has(name: ConstraintName): boolean {
    return this.byName.has(name);
  }

  hasAny(names: readonly ConstraintName[]): boolean {
    return names.some((n) => this.byName.has(n));
  }

  get(name: ConstraintName): Constraint | undefined {
    return this.byName.get(name);
  }

  severity(name: ConstraintName): number {
    return this.byName.get(name)?.severity ?? 0;
  }

  names(): ConstraintName[] {
    return [...this.byName.keys()];
  }

  list(): Constraint[] {
    return [...this.byName.values()];
  }

  get size(): number {
    return this.byName.size;
  }

  meanSeverity(): number {
    if (this.byName.size === 0) return 0;
    let sum = 0;
    for (const c of this.byName.values()) sum += c.severity;
    return sum / this.byName.size;
  }
}
