/**
 * Keyed collections of operation inputs or outputs
 *
 * @module operations/io-collection
 */

import { StructuralError, rethrowAt } from "../errors";
import { createLogger } from "../logger";
import type { OperationInputJSON, OperationOutputJSON } from "../types";
import { isRecord } from "../types";
import { type OperationInputOutput, OperationInput, OperationOutput } from "./io-entry";

const log = createLogger("io-collection");

export abstract class OperationInputOutputDict<E extends OperationInputOutput> {
  private readonly entriesByKey: ReadonlyMap<string, E>;

  protected constructor(raw: unknown, build: (raw: unknown) => E, what: string) {
    if (!isRecord(raw)) {
      throw new StructuralError(`The ${what} must be given as a mapping of names to entries.`);
    }
    const entries = new Map<string, E>();
    for (const [key, value] of Object.entries(raw)) {
      try {
        entries.set(key, build(value));
      } catch (error) {
        log.debug(`Problem with ${what} key "${key}": ${String(error)}`);
        rethrowAt(error, key);
      }
    }
    this.entriesByKey = entries;
  }

  keys(): string[] {
    return [...this.entriesByKey.keys()];
  }

  get(key: string): E | undefined {
    return this.entriesByKey.get(key);
  }

  has(key: string): boolean {
    return this.entriesByKey.has(key);
  }

  entries(): [string, E][] {
    return [...this.entriesByKey.entries()];
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  /**
   * Same keys, and equal entries under each
   */
  equals(other: OperationInputOutputDict<OperationInputOutput>): boolean {
    if (this.size !== other.size) return false;
    return this.entries().every(([key, entry]) => {
      const theirs = other.get(key);
      return theirs !== undefined && entry.equals(theirs);
    });
  }

  toJSON(): Record<string, OperationOutputJSON> {
    return this.mapEntries((entry) => entry.toJSON());
  }

  protected mapEntries<T>(fn: (entry: E) => T): Record<string, T> {
    return Object.fromEntries([...this.entriesByKey].map(([key, entry]): [string, T] => [key, fn(entry)]));
  }
}

export class OperationInputDict extends OperationInputOutputDict<OperationInput> {
  constructor(raw: unknown) {
    super(raw, (entry) => new OperationInput(entry), "inputs");
  }

  override toJSON(): Record<string, OperationInputJSON> {
    return this.mapEntries((entry) => entry.toJSON());
  }

  toString(): string {
    return `OperationInputDict with keys: ${this.keys().join(", ")}`;
  }
}

export class OperationOutputDict extends OperationInputOutputDict<OperationOutput> {
  constructor(raw: unknown) {
    super(raw, (entry) => new OperationOutput(entry), "outputs");
  }

  toString(): string {
    return `OperationOutputDict with keys: ${this.keys().join(", ")}`;
  }
}
