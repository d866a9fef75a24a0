/**
 * Operation payloads shared by the operation tests
 */

import { UUID_A } from "../support";

export const countsInput = {
  name: "Count matrix",
  description: "The raw counts to normalize",
  required: true,
  converter: "converters.SingleDataResource",
  spec: { attribute_type: "DataResource", resource_type: "MTX", many: false },
};

export const thresholdInput = {
  name: "Threshold",
  description: "Significance cutoff",
  required: false,
  converter: "converters.Float",
  spec: { attribute_type: "BoundedFloat", min: 0, max: 1, default: 0.05 },
};

export const normalizedOutput = {
  required: true,
  converter: "converters.SingleDataResource",
  spec: { attribute_type: "DataResource", resource_type: "FT", many: false },
};

export const normalizeOperation = {
  id: UUID_A,
  name: "Normalize",
  description: "Size-factor normalization of a count matrix",
  mode: "local_docker",
  repository_url: "https://github.com/example-lab/normalize",
  repository_name: "normalize",
  git_hash: "abc123",
  workspace_operation: true,
  inputs: { counts: countsInput, threshold: thresholdInput },
  outputs: { normalized: normalizedOutput },
};
