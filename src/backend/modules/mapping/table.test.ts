/**
 * ============================================================
 *  mapping table — Unit Tests
 * ============================================================
 *
 * Covers validation (ConfigError on every malformed shape),
 * immutability of loaded tables, and the built-in families
 * shipped under <repo>/mappings/.
 *
 * Module under test: src/backend/modules/mapping/table.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ConfigError } from "../../errors.js";
import {
  defaultMappingTable,
  formatCode,
  isControllerFamily,
  loadMappingFile,
  loadMappingTable,
  resolveMappingTable,
} from "./table.js";
import { STICK_AND_BUTTON_MAPPING } from "../../../tests/helpers/index.js";

/** Runs fn, asserts it throws ConfigError, and returns the error. */
function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    assert.ok(err instanceof ConfigError, `expected ConfigError, got ${String(err)}`);
    return err;
  }
  assert.fail("expected ConfigError to be thrown");
}

// ─── Loading ──────────────────────────────────────────────────────────────────

describe("loadMappingTable — valid configurations", () => {
  const table = loadMappingTable(STICK_AND_BUTTON_MAPPING);

  test("uses the configured family label", () => {
    assert.equal(table.family, "test-pad");
  });

  test("lookup by code returns the entry", () => {
    assert.deepEqual(table.lookup(0x130), { code: 0x130, name: "A", kind: "button" });
  });

  test("axis scale steps get default output bounds", () => {
    const entry = table.lookup(0x03);
    assert.ok(entry && entry.kind === "axis");
    assert.deepEqual(entry.normalization[0], { type: "scale", min: -32768, max: 32767, outMin: -1, outMax: 1 });
  });

  test("unknown codes are not found", () => {
    assert.equal(table.lookup(0x131), undefined);
  });

  test("names lists every logical control once, in declaration order", () => {
    assert.deepEqual(table.names, ["A", "LEFT_STICK_Y"]);
  });

  test("hex string codes are parsed", () => {
    const hex = loadMappingTable({ entries: [{ code: "0x13A", name: "SELECT", kind: "button" }] });
    assert.equal(hex.lookup(0x13a)?.name, "SELECT");
  });

  test("axis without normalization passes through", () => {
    const t = loadMappingTable({ entries: [{ code: 16, name: "PAD_X", kind: "axis" }] });
    assert.deepEqual(t.lookup(16), { code: 16, name: "PAD_X", kind: "axis", normalization: [] });
  });

  test("without a family the label is used", () => {
    const t = loadMappingTable({ entries: [{ code: 1, name: "X", kind: "button" }] }, "custom.json");
    assert.equal(t.family, "custom.json");
  });

  /**
   * Two codes may feed one logical control as long as the kind matches.
   * At runtime the later event wins.
   */
  test("two codes may alias one logical name of the same kind", () => {
    const t = loadMappingTable({
      entries: [
        { code: 0x130, name: "A", kind: "button" },
        { code: 0x1e, name: "A", kind: "button" },
      ],
    });
    assert.equal(t.size, 2);
    assert.deepEqual(t.names, ["A"]);
  });
});

describe("loadMappingTable — immutability", () => {
  const table = loadMappingTable(STICK_AND_BUTTON_MAPPING);

  test("the table, its names and entries are frozen", () => {
    assert.ok(Object.isFrozen(table));
    assert.ok(Object.isFrozen(table.names));
    for (const entry of table.entries()) {
      assert.ok(Object.isFrozen(entry), `${entry.name} should be frozen`);
    }
  });

  test("normalization steps are frozen", () => {
    const entry = table.lookup(0x03);
    assert.ok(entry && entry.kind === "axis");
    assert.ok(Object.isFrozen(entry.normalization));
    assert.ok(Object.isFrozen(entry.normalization[1]));
  });

  test("changing the source config afterwards does not affect the table", () => {
    const config = { entries: [{ code: 1, name: "X", kind: "button" }] };
    const t = loadMappingTable(config);
    config.entries[0].name = "Y";
    assert.equal(t.lookup(1)?.name, "X");
  });
});

// ─── ConfigError ──────────────────────────────────────────────────────────────

describe("loadMappingTable — rejected configurations", () => {
  test("duplicate code", () => {
    const err = configError(() =>
      loadMappingTable({
        entries: [
          { code: 0x130, name: "A", kind: "button" },
          { code: "0x130", name: "B", kind: "button" },
        ],
      })
    );
    assert.deepEqual(err.issues, ['entries.1.code: Duplicate code 0x130 (already mapped to "A")']);
  });

  test("unrecognized normalization type", () => {
    const err = configError(() =>
      loadMappingTable({
        entries: [{ code: 0, name: "LEFT_STICK_X", kind: "axis", normalization: [{ type: "smooth" }] }],
      })
    );
    assert.ok(
      err.issues.some((issue) => issue.startsWith("entries.0.normalization.0.type:")),
      err.issues.join("\n")
    );
  });

  test("unrecognized kind", () => {
    const err = configError(() => loadMappingTable({ entries: [{ code: 0, name: "T", kind: "trigger" }] }));
    assert.ok(err.issues.some((issue) => issue.startsWith("entries.0.kind:")), err.issues.join("\n"));
  });

  test("buttons take no normalization", () => {
    const err = configError(() =>
      loadMappingTable({
        entries: [{ code: 0x130, name: "A", kind: "button", normalization: [{ type: "invert" }] }],
      })
    );
    assert.ok(err.issues.some((issue) => issue.startsWith("entries.0: Unrecognized key")), err.issues.join("\n"));
  });

  test("scale with an empty range", () => {
    const err = configError(() =>
      loadMappingTable({
        entries: [{ code: 0, name: "X", kind: "axis", normalization: [{ type: "scale", min: 10, max: 10 }] }],
      })
    );
    assert.deepEqual(err.issues, ["entries.0.normalization.0: scale.min must be below scale.max"]);
  });

  test("negative deadzone", () => {
    configError(() =>
      loadMappingTable({
        entries: [{ code: 0, name: "X", kind: "axis", normalization: [{ type: "deadzone", threshold: -1 }] }],
      })
    );
  });

  test("one logical name with two kinds", () => {
    const err = configError(() =>
      loadMappingTable({
        entries: [
          { code: 0x138, name: "LEFT_TRIGGER", kind: "button" },
          { code: 0x02, name: "LEFT_TRIGGER", kind: "axis" },
        ],
      })
    );
    assert.deepEqual(err.issues, ['entries.1.name: "LEFT_TRIGGER" is already mapped as a button']);
  });

  test("malformed hex code", () => {
    configError(() => loadMappingTable({ entries: [{ code: "BTN_SOUTH", name: "A", kind: "button" }] }));
  });

  test("empty entry list", () => {
    configError(() => loadMappingTable({ entries: [] }));
  });

  test("not an object at all", () => {
    configError(() => loadMappingTable("wiiu"));
  });

  test("the error message lists every issue", () => {
    const err = configError(() =>
      loadMappingTable({
        entries: [
          { code: 1, name: "A", kind: "button" },
          { code: 1, name: "B", kind: "button" },
          { code: 2, name: "A", kind: "axis" },
        ],
      })
    );
    assert.equal(err.issues.length, 2);
    assert.match(err.message, /^Invalid mapping \(inline mapping\): /);
  });
});

// ─── Files ────────────────────────────────────────────────────────────────────

describe("loadMappingFile", () => {
  const dir = mkdtempSync(join(tmpdir(), "btpad-mapping-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  test("loads a JSON file and labels it with the path when no family is set", () => {
    const path = join(dir, "pad.json");
    writeFileSync(path, JSON.stringify({ entries: [{ code: 0x130, name: "A", kind: "button" }] }));
    const t = loadMappingFile(path);
    assert.equal(t.family, path);
    assert.equal(t.lookup(0x130)?.name, "A");
  });

  test("missing file → ConfigError", () => {
    configError(() => loadMappingFile(join(dir, "missing.json")));
  });

  test("invalid JSON → ConfigError", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ entries: ");
    const err = configError(() => loadMappingFile(path));
    assert.match(err.message, /^Cannot read mapping file/);
  });
});

// ─── Built-in families ────────────────────────────────────────────────────────

describe("defaultMappingTable — built-in families", () => {
  test("wiiu is the default family", () => {
    assert.equal(defaultMappingTable().family, "wiiu");
  });

  test("wiiu: A is BTN_EAST, sticks scale ±1280", () => {
    const t = defaultMappingTable("wiiu");
    assert.equal(t.size, 21);
    assert.equal(t.lookup(0x131)?.name, "A");
    assert.deepEqual(t.lookup(0x00), {
      code: 0x00,
      name: "LEFT_STICK_X",
      kind: "axis",
      normalization: [{ type: "scale", min: -1280, max: 1280, outMin: -1, outMax: 1 }],
    });
  });

  test("ps3: cross is A, analog L2 is LEFT_TRIGGER on 0..1", () => {
    const t = defaultMappingTable("ps3");
    assert.equal(t.size, 23);
    assert.equal(t.lookup(0x130)?.name, "A");
    assert.deepEqual(t.lookup(0x02), {
      code: 0x02,
      name: "LEFT_TRIGGER",
      kind: "axis",
      normalization: [{ type: "scale", min: 0, max: 255, outMin: 0, outMax: 1 }],
    });
  });

  test("xbox: d-pad hat axes pass through", () => {
    const t = defaultMappingTable("xbox");
    assert.equal(t.size, 19);
    assert.deepEqual(t.lookup(0x10), {
      code: 0x10,
      name: "PAD_X",
      kind: "axis",
      normalization: [{ type: "passthrough" }],
    });
  });

  test("every family maps the four stick axes", () => {
    for (const family of ["wiiu", "ps3", "xbox"] as const) {
      const names = defaultMappingTable(family).names;
      for (const axis of ["LEFT_STICK_X", "LEFT_STICK_Y", "RIGHT_STICK_X", "RIGHT_STICK_Y"]) {
        assert.ok(names.includes(axis), `${family} should map ${axis}`);
      }
    }
  });
});

describe("resolveMappingTable — precedence", () => {
  test("no mapping → family default", () => {
    assert.equal(resolveMappingTable({ family: "ps3" }).family, "ps3");
  });

  test("structured mapping wins over the family", () => {
    assert.equal(resolveMappingTable({ family: "ps3", mapping: STICK_AND_BUTTON_MAPPING }).family, "test-pad");
  });

  test("a string mapping is read as a file path", () => {
    configError(() => resolveMappingTable({ mapping: "/nonexistent/btpad/mapping.json" }));
  });
});

// ─── Helpers ──────────────────────────────────────────────────────────────────

describe("formatCode / isControllerFamily", () => {
  test("formatCode prints lowercase hex", () => {
    assert.equal(formatCode(0x130), "0x130");
    assert.equal(formatCode(3), "0x3");
  });

  test("isControllerFamily", () => {
    assert.equal(isControllerFamily("xbox"), true);
    assert.equal(isControllerFamily("gamecube"), false);
  });
});
