import { describe, expect, it } from "vitest";
import { accumulateList, resolveListFields } from "./list.js";
import type { StackEntry } from "./scalar.js";
import type { ListFieldsInput } from "./types.js";

const stack = (...entries: [string, ListFieldsInput][]): StackEntry<ListFieldsInput>[] =>
  entries.map(([origin, fields]) => ({ origin, fields }));

describe("accumulateList", () => {
  describe("set mode", () => {
    it("should union values in first-seen order", () => {
      const { values, sources } = accumulateList(
        stack(["/g.jsonc", { mountsRO: ["/a", "/b"] }], ["/l.jsonc", { mountsRO: ["/b", "/c"] }]),
        (fields) => fields.mountsRO,
        "set",
      );

      expect(values).toEqual(["/a", "/b", "/c"]);
      expect(sources).toEqual([
        { value: "/a", origin: "/g.jsonc" },
        { value: "/b", origin: "/g.jsonc" },
        { value: "/c", origin: "/l.jsonc" },
      ]);
    });

    it("should drop duplicates inside one entry", () => {
      const { values } = accumulateList(
        stack(["/g.jsonc", { env: ["A", "A", "B"] }]),
        (fields) => fields.env,
        "set",
      );

      expect(values).toEqual(["A", "B"]);
    });

    it("should skip entries that do not set the field", () => {
      const { values, sources } = accumulateList(
        stack(["default", {}], ["/l.jsonc", { env: ["TOKEN"] }]),
        (fields) => fields.env,
        "set",
      );

      expect(values).toEqual(["TOKEN"]);
      expect(sources).toEqual([{ value: "TOKEN", origin: "/l.jsonc" }]);
    });
  });

  describe("sequence mode", () => {
    it("should keep duplicates in order", () => {
      const { values } = accumulateList(
        stack(["/g.jsonc", { postBuildHooks: ["x"] }], ["/l.jsonc", { postBuildHooks: ["x", "y"] }]),
        (fields) => fields.postBuildHooks,
        "sequence",
      );

      expect(values).toEqual(["x", "x", "y"]);
    });

    it("should attribute every occurrence to the first origin", () => {
      const { sources } = accumulateList(
        stack(["/g.jsonc", { preRunHooks: ["x"] }], ["/l.jsonc", { preRunHooks: ["y", "x"] }]),
        (fields) => fields.preRunHooks,
        "sequence",
      );

      expect(sources).toEqual([
        { value: "x", origin: "/g.jsonc" },
        { value: "y", origin: "/l.jsonc" },
        { value: "x", origin: "/g.jsonc" },
      ]);
    });
  });
});

describe("resolveListFields", () => {
  it("should merge every list with its own mode", () => {
    const { fields, provenance } = resolveListFields(
      stack(
        ["/g.jsonc", { mountsRW: ["/w"], env: ["A"], preRunHooks: ["setup"] }],
        ["/l.jsonc", { mountsRW: ["/w"], env: ["A"], preRunHooks: ["setup"] }],
      ),
    );

    expect(fields).toEqual({
      mountsRO: [],
      mountsRW: ["/w"],
      env: ["A"],
      preRunHooks: ["setup", "setup"],
      postBuildHooks: [],
    });
    expect(provenance.mountsRW).toEqual([{ value: "/w", origin: "/g.jsonc" }]);
    expect(provenance.preRunHooks).toHaveLength(2);
  });

  it("should keep provenance parallel to values", () => {
    const { fields, provenance } = resolveListFields(
      stack(["/g.jsonc", { mountsRO: ["/a", "/b"] }], ["/l.jsonc", { mountsRO: ["/c", "/a"] }]),
    );

    expect(provenance.mountsRO.map((entry) => entry.value)).toEqual(fields.mountsRO);
  });
});
