/**
 * Operations: the declared contract of one analysis tool
 *
 * @module operations/operation
 */

import { type } from "arktype";
import { coerceBoolean } from "../attributes/boolean";
import { describeValue } from "../attributes/base";
import { AttributeValueError, StructuralError, checkExactKeys, rethrowAt } from "../errors";
import { createLogger } from "../logger";
import type { OperationJSON } from "../types";
import { UuidSchema, isRecord } from "../types";
import { OperationInputDict, OperationOutputDict } from "./io-collection";

const log = createLogger("operation");

export const OPERATION_KEYS = [
  "id",
  "name",
  "description",
  "mode",
  "repository_url",
  "repository_name",
  "git_hash",
  "workspace_operation",
  "inputs",
  "outputs",
] as const;

const OperationFields = type({
  id: UuidSchema,
  name: "string",
  description: "string",
  mode: "string",
  repository_url: "string",
  repository_name: "string",
  git_hash: "string",
});

export class Operation {
  /** Lowercased UUID */
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** How the operation is run (e.g. a container runner); opaque here */
  readonly mode: string;
  readonly repositoryUrl: string;
  readonly repoName: string;
  readonly gitHash: string;
  /** Whether the operation acts on a workspace as a whole */
  readonly workspaceOperation: boolean;
  readonly inputs: OperationInputDict;
  readonly outputs: OperationOutputDict;

  constructor(raw: unknown) {
    if (!isRecord(raw)) {
      throw new StructuralError("An operation must be given as a mapping.");
    }
    try {
      checkExactKeys(raw, OPERATION_KEYS, "operation");
    } catch (error) {
      log.debug(`Rejected an operation: ${String(error)}`);
      throw error;
    }

    const fields = OperationFields(raw);
    if (fields instanceof type.errors) {
      throw new AttributeValueError(`Invalid operation: ${fields.summary}`);
    }
    this.id = fields.id.toLowerCase();
    this.name = fields.name;
    this.description = fields.description;
    this.mode = fields.mode;
    this.repositoryUrl = fields.repository_url;
    this.repoName = fields.repository_name;
    this.gitHash = fields.git_hash;

    const workspaceOperation = coerceBoolean(raw.workspace_operation);
    if (workspaceOperation === undefined) {
      throw new AttributeValueError(
        `Expected a boolean-like value, but received "${describeValue(raw.workspace_operation)}".`
      ).prependPath("workspace_operation");
    }
    this.workspaceOperation = workspaceOperation;

    try {
      this.inputs = new OperationInputDict(raw.inputs);
    } catch (error) {
      rethrowAt(error, "inputs");
    }
    try {
      this.outputs = new OperationOutputDict(raw.outputs);
    } catch (error) {
      rethrowAt(error, "outputs");
    }
  }

  static fromJSON(raw: unknown): Operation {
    return new Operation(raw);
  }

  /**
   * Check the resource types declared by every input and output against the
   * caller's vocabulary
   */
  checkResourceTypeKeys(allowed: Iterable<string>): void {
    const vocabulary = [...allowed];
    for (const [section, collection] of [
      ["inputs", this.inputs],
      ["outputs", this.outputs],
    ] as const) {
      for (const [key, entry] of collection.entries()) {
        try {
          entry.checkResourceTypeKeys(vocabulary);
        } catch (error) {
          rethrowAt(error, section, key);
        }
      }
    }
  }

  toJSON(): OperationJSON {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      mode: this.mode,
      repository_url: this.repositoryUrl,
      repository_name: this.repoName,
      git_hash: this.gitHash,
      workspace_operation: this.workspaceOperation,
      inputs: this.inputs.toJSON(),
      outputs: this.outputs.toJSON(),
    };
  }

  equals(other: Operation): boolean {
    return (
      this.id === other.id &&
      this.name === other.name &&
      this.description === other.description &&
      this.mode === other.mode &&
      this.repositoryUrl === other.repositoryUrl &&
      this.repoName === other.repoName &&
      this.gitHash === other.gitHash &&
      this.workspaceOperation === other.workspaceOperation &&
      this.inputs.equals(other.inputs) &&
      this.outputs.equals(other.outputs)
    );
  }

  toString(): string {
    return `Operation (${this.name}, ${this.id})`;
  }
}
