import { describe, it, expect } from "vitest";
import {
  toLiteralMap,
  toLiteralType,
  toVariableMap,
} from "../../../../src/core/workflow/literals";
import {
  buildLaunchPlanSpec,
  buildWorkflowSpec,
  formatImageReference,
  type Identifier,
  type LoadedWorkflow,
} from "../../../../src/core/workflow/serialization";
import { StructuredDataset, types } from "../../../../src/core/workflow/types";
import { defineWorkflow } from "../../../../src/core/workflow/workflow";

const workflow: LoadedWorkflow = {
  qualifiedName: "flows.etl.pipeline",
  moduleName: "flows.etl",
  exportName: "pipeline",
  sourceFile: "/work/flows/etl.ts",
  settings: {},
  entity: defineWorkflow({
    description: "Loads a table",
    inputs: { table: types.structuredDataset("csv"), limit: types.integer() },
    outputs: { o0: types.string() },
    run: () => "done",
  }),
};

const id: Identifier = {
  resourceType: "WORKFLOW",
  project: "flytesnacks",
  domain: "development",
  name: "flows.etl.pipeline",
  version: "abc123",
};

const image = {
  defaultImage: { name: "default", fqn: "ghcr.io/acme/runner", tag: "1.0" },
  images: [{ name: "default", fqn: "ghcr.io/acme/runner", tag: "1.0" }],
};

describe("literals", () => {
  it("maps every type tag to a literal type", () => {
    expect(toLiteralType(types.string())).toEqual({ simple: "STRING" });
    expect(toLiteralType(types.integer())).toEqual({ simple: "INTEGER" });
    expect(toLiteralType(types.float())).toEqual({ simple: "FLOAT" });
    expect(toLiteralType(types.boolean())).toEqual({ simple: "BOOLEAN" });
    expect(toLiteralType(types.datetime())).toEqual({ simple: "DATETIME" });
    expect(toLiteralType(types.blob())).toEqual({
      blob: { dimensionality: "SINGLE" },
    });
    expect(toLiteralType(types.structuredDataset())).toEqual({
      structuredDatasetType: { format: "" },
    });
  });

  it("describes variables by name", () => {
    expect(toVariableMap({ limit: types.integer() })).toEqual({
      variables: {
        limit: { type: { simple: "INTEGER" }, description: "limit" },
      },
    });
  });

  it("converts resolved inputs to literals", () => {
    expect(
      toLiteralMap({
        name: "ada",
        count: 42,
        table: new StructuredDataset("s3://bucket/key", "csv"),
      })
    ).toEqual({
      literals: {
        name: { scalar: { primitive: { stringValue: "ada" } } },
        count: { scalar: { primitive: { integer: 42 } } },
        table: {
          scalar: {
            structuredDataset: {
              uri: "s3://bucket/key",
              metadata: { structuredDatasetType: { format: "csv" } },
            },
          },
        },
      },
    });
  });
});

describe("formatImageReference", () => {
  it("prefers a digest over a tag", () => {
    expect(
      formatImageReference({ name: "default", fqn: "repo/img", digest: "sha256:ff" })
    ).toBe("repo/img@sha256:ff");
    expect(
      formatImageReference({ name: "default", fqn: "repo/img", tag: "v1" })
    ).toBe("repo/img:v1");
  });
});

describe("buildWorkflowSpec", () => {
  it("points the container at the unpacked script", () => {
    const spec = buildWorkflowSpec(workflow, id, {
      image,
      fastSerialization: {
        enabled: true,
        destinationDir: "/root",
        distributionLocation: "s3://bucket/scriptmode-abc123.tar.gz",
      },
    });

    expect(spec.template.container).toEqual({
      image: "ghcr.io/acme/runner:1.0",
      args: [
        "scriptflow-execute",
        "--dest-dir",
        "/root",
        "--additional-distribution",
        "s3://bucket/scriptmode-abc123.tar.gz",
        "--workflow",
        "flows.etl.pipeline",
      ],
    });
    expect(spec.template.id).toBe(id);
    expect(spec.template.metadata).toEqual({ description: "Loads a table" });
    expect(Object.keys(spec.template.interface.inputs.variables)).toEqual([
      "table",
      "limit",
    ]);
  });

  it("omits fast registration arguments when disabled", () => {
    const spec = buildWorkflowSpec(workflow, id, { image });

    expect(spec.template.container.args).toEqual([
      "scriptflow-execute",
      "--workflow",
      "flows.etl.pipeline",
    ]);
  });

  it("requires an image", () => {
    expect(() => buildWorkflowSpec(workflow, id, {})).toThrow(
      "Serialization settings must include an image configuration."
    );
  });
});

describe("buildLaunchPlanSpec", () => {
  it("requires every workflow input", () => {
    const spec = buildLaunchPlanSpec(workflow, id);

    expect(spec.workflowId).toBe(id);
    expect(spec.defaultInputs.parameters.limit).toEqual({
      var: { type: { simple: "INTEGER" }, description: "limit" },
      required: true,
    });
    expect(spec.defaultInputs.parameters.table.required).toBe(true);
  });
});
