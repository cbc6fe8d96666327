import { describe, it, expect, vi } from "vitest";
import {
  parseInteger,
  resolveWorkflowInputs,
  type ArgumentStager,
} from "../../../../src/core/workflow/argument-resolver";
import {
  StructuredDataset,
  types,
  type WorkflowInterface,
} from "../../../../src/core/workflow/types";
import {
  ConversionError,
  LookupError,
  MissingArgumentValueError,
  UnsupportedTypeError,
  ValidationError,
} from "../../../../src/errors";

const createStager = () => {
  let counter = 0;
  const createUploadLocation = vi.fn(async () => {
    counter += 1;
    return {
      nativeUrl: `s3://bucket/upload-${counter}`,
      signedUrl: `https://storage.test/upload-${counter}?sig=abc`,
    };
  });
  const putData = vi.fn(async (_localPath: string, _remoteUrl: string) => {});
  const stager: ArgumentStager = { createUploadLocation, putData };
  return { stager, createUploadLocation, putData };
};

const iface: WorkflowInterface = {
  name: types.string(),
  count: types.integer(),
  table: types.structuredDataset("parquet"),
  ratio: types.float(),
  enabled: types.boolean(),
  when: types.datetime(),
  payload: types.blob(),
};

describe("resolveWorkflowInputs", () => {
  it("returns an empty map for no tokens", async () => {
    const { stager, createUploadLocation } = createStager();

    await expect(resolveWorkflowInputs([], iface, stager)).resolves.toEqual({});
    expect(createUploadLocation).not.toHaveBeenCalled();
  });

  it("passes string inputs through unchanged", async () => {
    const { stager } = createStager();

    const resolved = await resolveWorkflowInputs(
      ["--name", "  spaced value "],
      iface,
      stager
    );

    expect(resolved).toEqual({ name: "  spaced value " });
  });

  it("parses integer inputs", async () => {
    const { stager } = createStager();

    const resolved = await resolveWorkflowInputs(
      ["--count", "-5"],
      iface,
      stager
    );

    expect(resolved).toEqual({ count: -5 });
  });

  it("uploads structured datasets and references the native location", async () => {
    const { stager, createUploadLocation, putData } = createStager();

    const resolved = await resolveWorkflowInputs(
      ["--table", "data/input.parquet"],
      iface,
      stager
    );

    expect(createUploadLocation).toHaveBeenCalledTimes(1);
    expect(putData).toHaveBeenCalledWith(
      "data/input.parquet",
      "https://storage.test/upload-1?sig=abc"
    );
    expect(resolved.table).toBeInstanceOf(StructuredDataset);
    expect(resolved.table).toEqual(
      new StructuredDataset("s3://bucket/upload-1", "parquet")
    );
  });

  it("stages one upload per structured dataset argument, in order", async () => {
    const { stager, putData } = createStager();
    const tables: WorkflowInterface = {
      left: types.structuredDataset(),
      right: types.structuredDataset(),
    };

    const resolved = await resolveWorkflowInputs(
      ["--left", "a.csv", "--right", "b.csv"],
      tables,
      stager
    );

    expect(putData.mock.calls).toEqual([
      ["a.csv", "https://storage.test/upload-1?sig=abc"],
      ["b.csv", "https://storage.test/upload-2?sig=abc"],
    ]);
    expect(resolved).toEqual({
      left: new StructuredDataset("s3://bucket/upload-1"),
      right: new StructuredDataset("s3://bucket/upload-2"),
    });
  });

  it("lets a later pair overwrite an earlier one for the same input", async () => {
    const { stager } = createStager();

    const resolved = await resolveWorkflowInputs(
      ["--name", "first", "--name", "second"],
      iface,
      stager
    );

    expect(resolved).toEqual({ name: "second" });
  });

  it("rejects an odd number of tokens", async () => {
    const { stager } = createStager();

    const result = resolveWorkflowInputs(
      ["--name", "x", "--count"],
      iface,
      stager
    );

    await expect(result).rejects.toBeInstanceOf(MissingArgumentValueError);
    await expect(result).rejects.toThrow("Argument --count requires a value.");
  });

  it("rejects flags without the double dash prefix", async () => {
    const { stager } = createStager();

    await expect(
      resolveWorkflowInputs(["name", "x"], iface, stager)
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      resolveWorkflowInputs(["--", "x"], iface, stager)
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects inputs the workflow does not declare", async () => {
    const { stager } = createStager();

    const result = resolveWorkflowInputs(["--unknown", "1"], iface, stager);

    await expect(result).rejects.toBeInstanceOf(LookupError);
    await expect(result).rejects.toThrow("Workflow has no input named unknown");
  });

  it("does not resolve inherited object properties as inputs", async () => {
    const { stager } = createStager();

    await expect(
      resolveWorkflowInputs(["--toString", "x"], iface, stager)
    ).rejects.toBeInstanceOf(LookupError);
  });

  it.each([
    ["ratio", "float"],
    ["enabled", "boolean"],
    ["when", "datetime"],
    ["payload", "blob"],
  ])("rejects %s inputs of unsupported type %s", async (name, kind) => {
    const { stager } = createStager();

    const result = resolveWorkflowInputs([`--${name}`, "1"], iface, stager);

    await expect(result).rejects.toBeInstanceOf(UnsupportedTypeError);
    await expect(result).rejects.toThrow(
      `Unsupported type for argument ${name}: ${kind}`
    );
  });

  it("stops at the first failing pair after earlier uploads", async () => {
    const { stager, putData } = createStager();

    await expect(
      resolveWorkflowInputs(
        ["--table", "a.csv", "--count", "many"],
        iface,
        stager
      )
    ).rejects.toBeInstanceOf(ConversionError);
    expect(putData).toHaveBeenCalledTimes(1);
  });

  it("propagates staging failures unchanged", async () => {
    const { stager, putData } = createStager();
    const failure = new Error("disk full");
    putData.mockRejectedValueOnce(failure);

    await expect(
      resolveWorkflowInputs(["--table", "a.csv"], iface, stager)
    ).rejects.toBe(failure);
  });
});

describe("parseInteger", () => {
  it.each([
    ["42", 42],
    ["+7", 7],
    ["-12", -12],
    [" 3 ", 3],
    ["1_000", 1000],
    ["007", 7],
  ])("parses %j as %d", (raw, expected) => {
    expect(parseInteger("count", raw)).toBe(expected);
  });

  it.each(["", "abc", "1.5", "1e3", "0x10", "1__0", "_1", "--1"])(
    "rejects %j",
    (raw) => {
      expect(() => parseInteger("count", raw)).toThrow(
        `Invalid value "${raw}" for argument count: expected an integer.`
      );
    }
  );

  it("rejects values outside the safe integer range", () => {
    expect(() => parseInteger("count", "9007199254740993")).toThrow(
      ConversionError
    );
    expect(() => parseInteger("count", "9007199254740993")).toThrow(
      "expected an integer within the safe range"
    );
  });
});
