import { describe, it, expect, vi, afterEach } from "vitest";
import { utimesSync, writeFileSync } from "fs";
import { join } from "path";

vi.mock("../../utils/logger.js", () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import {
  HandlerRegistry,
  listHandlerCandidates,
  resolveEntryPoint,
  handlerNameFromFile,
} from "../registry.js";
import { buildHandlerContext } from "../context.js";
import {
  createFakeImporter,
  createFakeTransport,
  createHandlerDir,
  makeChatMessage,
} from "./helpers.js";

const yes = (_ctx: unknown) => true;
const no = (_ctx: unknown) => false;

describe("listHandlerCandidates", () => {
  let fixture: ReturnType<typeof createHandlerDir>;

  afterEach(() => fixture.cleanup());

  it("returns eligible files sorted by name", () => {
    fixture = createHandlerDir([
      "b.js",
      "a.mjs",
      "c.cjs",
      "index.js",
      "_private.js",
      ".hidden.js",
      "notes.txt",
      "types.d.ts",
    ]);

    const files = listHandlerCandidates(fixture.dir);

    expect(files).toEqual([
      join(fixture.dir, "a.mjs"),
      join(fixture.dir, "b.js"),
      join(fixture.dir, "c.cjs"),
    ]);
  });

  it("throws when the directory does not exist", () => {
    fixture = createHandlerDir();
    expect(() => listHandlerCandidates(join(fixture.dir, "missing"))).toThrow();
  });
});

describe("resolveEntryPoint", () => {
  it("prefers the named handleMessage export", () => {
    expect(resolveEntryPoint({ handleMessage: yes, default: no })).toBe(yes);
  });

  it("falls back to a default export function", () => {
    expect(resolveEntryPoint({ default: no })).toBe(no);
  });

  it("falls back to default.handleMessage", () => {
    expect(resolveEntryPoint({ default: { handleMessage: yes } })).toBe(yes);
  });

  it("returns undefined when nothing callable is exported", () => {
    expect(resolveEntryPoint({ handleMessage: "nope" })).toBeUndefined();
    expect(resolveEntryPoint({})).toBeUndefined();
    expect(resolveEntryPoint(null)).toBeUndefined();
  });
});

describe("handlerNameFromFile", () => {
  it("strips directory and extension", () => {
    expect(handlerNameFromFile("/x/auto_responses/greet.mjs")).toBe("greet");
  });
});

describe("HandlerRegistry", () => {
  let fixture: ReturnType<typeof createHandlerDir>;

  afterEach(() => fixture.cleanup());

  it("loads handlers in file-name order", async () => {
    fixture = createHandlerDir(["zeta.js", "alpha.js", "mid.mjs"]);
    const importer = createFakeImporter({
      "alpha.js": { handleMessage: yes },
      "mid.mjs": { default: no },
      "zeta.js": { default: { handleMessage: yes } },
    });
    const registry = new HandlerRegistry({ directory: fixture.dir, importer });

    const report = await registry.load();

    expect(registry.names).toEqual(["alpha", "mid", "zeta"]);
    expect(report.loaded).toEqual(["alpha", "mid", "zeta"]);
    expect(report.outcomes.map((o) => o.status)).toEqual(["loaded", "loaded", "loaded"]);
    expect(importer.calls).toEqual(["alpha.js", "mid.mjs", "zeta.js"]);
  });

  it("passes the file modification time to the importer", async () => {
    fixture = createHandlerDir(["one.js"]);
    const importer = vi.fn(async (_file: string, _version: number) => ({ handleMessage: yes }));
    const registry = new HandlerRegistry({ directory: fixture.dir, importer });

    await registry.load();

    expect(importer).toHaveBeenCalledWith(join(fixture.dir, "one.js"), expect.any(Number));
  });

  it("keeps loading when one file fails to import", async () => {
    fixture = createHandlerDir(["a.js", "b.js", "c.js"]);
    const importer = createFakeImporter({
      "a.js": { handleMessage: yes },
      "b.js": new SyntaxError("Unexpected token '}'"),
      "c.js": { handleMessage: no },
    });
    const registry = new HandlerRegistry({ directory: fixture.dir, importer });

    const report = await registry.load();

    expect(registry.count).toBe(2);
    expect(registry.names).toEqual(["a", "c"]);
    const errors = report.outcomes.filter((o) => o.status === "error");
    expect(errors).toEqual([
      { status: "error", name: "b", file: join(fixture.dir, "b.js"), error: "Unexpected token '}'" },
    ]);
  });

  it("reports a handler whose import fails without loading anything from it", async () => {
    fixture = createHandlerDir(["broken.js"]);
    const importer = createFakeImporter({
      "broken.js": new Error("Cannot find package 'left-pad'"),
    });
    const registry = new HandlerRegistry({ directory: fixture.dir, importer });

    const report = await registry.load();

    expect(registry.count).toBe(0);
    expect(report.loaded).toEqual([]);
    expect(report.outcomes).toHaveLength(1);
    expect(report.outcomes[0].status).toBe("error");
  });

  it("skips modules without an entry point or with the wrong arity", async () => {
    fixture = createHandlerDir(["empty.js", "twoargs.js", "ok.js"]);
    const importer = createFakeImporter({
      "empty.js": { helper: yes },
      "twoargs.js": { handleMessage: (_a: unknown, _b: unknown) => true },
      "ok.js": { handleMessage: () => true },
    });
    const registry = new HandlerRegistry({ directory: fixture.dir, importer });

    const report = await registry.load();

    expect(registry.names).toEqual(["ok"]);
    expect(report.outcomes.map((o) => [o.name, o.status])).toEqual([
      ["empty", "skipped"],
      ["ok", "loaded"],
      ["twoargs", "skipped"],
    ]);
  });

  it("yields an empty registry for a missing directory", async () => {
    fixture = createHandlerDir();
    const registry = new HandlerRegistry({
      directory: join(fixture.dir, "nope"),
      importer: createFakeImporter({}),
    });

    const report = await registry.load();

    expect(registry.count).toBe(0);
    expect(report.outcomes).toEqual([]);
  });

  it("lets the later-sorted file win when two files share a name", async () => {
    fixture = createHandlerDir(["greet.js", "greet.mjs", "other.js"]);
    const fromMjs = (_ctx: unknown) => true;
    const importer = createFakeImporter({
      "greet.js": { handleMessage: no },
      "greet.mjs": { handleMessage: fromMjs },
      "other.js": { handleMessage: no },
    });
    const registry = new HandlerRegistry({ directory: fixture.dir, importer });

    await registry.load();

    expect(registry.names).toEqual(["greet", "other"]);
    expect(registry.snapshot()[0].handle).toBe(fromMjs);
    expect(registry.snapshot()[0].file).toBe(join(fixture.dir, "greet.mjs"));
  });

  it("replaces the snapshot on reload without touching the previous one", async () => {
    fixture = createHandlerDir(["a.js"]);
    const importer = createFakeImporter({
      "a.js": { handleMessage: yes },
      "b.js": { handleMessage: no },
    });
    const registry = new HandlerRegistry({ directory: fixture.dir, importer });
    await registry.load();
    const before = registry.snapshot();

    fixture.add("b.js");
    await registry.reload();

    expect(before.map((h) => h.name)).toEqual(["a"]);
    expect(Object.isFrozen(before)).toBe(true);
    expect(registry.names).toEqual(["a", "b"]);
    expect(registry.snapshot()).not.toBe(before);
  });

  it("exposes the last load report", async () => {
    fixture = createHandlerDir(["a.js"]);
    const registry = new HandlerRegistry({
      directory: fixture.dir,
      importer: createFakeImporter({ "a.js": { handleMessage: yes } }),
    });

    expect(registry.lastReport).toBeNull();
    await registry.load();
    expect(registry.lastReport?.loaded).toEqual(["a"]);
    expect(registry.lastReport?.directory).toBe(fixture.dir);
  });

  it("applies overlapping loads in call order so the newest scan wins", async () => {
    fixture = createHandlerDir(["a.js"]);
    let releaseFirstImport = () => {};
    const firstImport = new Promise<void>((resolve) => {
      releaseFirstImport = () => resolve();
    });
    let importCount = 0;
    const registry = new HandlerRegistry({
      directory: fixture.dir,
      importer: async () => {
        importCount++;
        if (importCount === 1) await firstImport;
        return { handleMessage: yes };
      },
    });

    const first = registry.load();
    await vi.waitFor(() => expect(importCount).toBe(1));
    fixture.add("b.js");
    const second = registry.reload();
    releaseFirstImport();
    const [firstReport, secondReport] = await Promise.all([first, second]);

    expect(firstReport.loaded).toEqual(["a"]);
    expect(secondReport.loaded).toEqual(["a", "b"]);
    expect(registry.names).toEqual(["a", "b"]);
    expect(registry.lastReport).toBe(secondReport);
  });
});

describe("HandlerRegistry with the module loader", () => {
  let fixture: ReturnType<typeof createHandlerDir>;

  afterEach(() => fixture.cleanup());

  const write = (name: string, source: string, mtimeSeconds: number) => {
    const file = join(fixture.dir, name);
    writeFileSync(file, source);
    utimesSync(file, mtimeSeconds, mtimeSeconds);
    return file;
  };

  const contextFor = (text: string) =>
    buildHandlerContext(makeChatMessage({ text }), { transport: createFakeTransport() });

  it("loads ES modules and CommonJS files from disk", async () => {
    fixture = createHandlerDir();
    write("echo.mjs", 'export function handleMessage(ctx) { return ctx.content === "ping"; }\n', 1_000);
    write(
      "legacy.cjs",
      "module.exports = { handleMessage: function (ctx) { return ctx.content === 'old'; } };\n",
      1_000
    );
    const registry = new HandlerRegistry({ directory: fixture.dir });

    const report = await registry.load();

    expect(report.loaded).toEqual(["echo", "legacy"]);
    const [echo, legacy] = registry.snapshot();
    expect(echo.handle(contextFor("ping"))).toBe(true);
    expect(echo.handle(contextFor("pong"))).toBe(false);
    expect(legacy.handle(contextFor("old"))).toBe(true);
  });

  it("isolates files that throw while loading or do not parse", async () => {
    fixture = createHandlerDir();
    write("a_ok.mjs", "export default function (ctx) { return true; }\n", 1_000);
    write("boom.mjs", 'throw new Error("boom at load");\n', 1_000);
    write("broken.mjs", "export function handleMessage(ctx) {\n", 1_000);
    const registry = new HandlerRegistry({ directory: fixture.dir });

    const report = await registry.load();

    expect(registry.names).toEqual(["a_ok"]);
    expect(report.outcomes.map((o) => [o.name, o.status])).toEqual([
      ["a_ok", "loaded"],
      ["boom", "error"],
      ["broken", "error"],
    ]);
    expect(report.outcomes[1]).toMatchObject({ error: "boom at load" });
  });

  it("evaluates an edited file again on reload", async () => {
    fixture = createHandlerDir();
    write("greet.mjs", 'export function handleMessage(ctx) { return ctx.content === "one"; }\n', 1_000);
    const registry = new HandlerRegistry({ directory: fixture.dir });
    await registry.load();
    expect(registry.snapshot()[0].handle(contextFor("two"))).toBe(false);

    write("greet.mjs", 'export function handleMessage(ctx) { return ctx.content === "two"; }\n', 2_000);
    await registry.reload();

    expect(registry.snapshot()[0].handle(contextFor("two"))).toBe(true);
  });
});
