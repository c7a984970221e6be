import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { rmSync, symlinkSync } from "node:fs";
import { basename, join } from "node:path";

import { runDispatch } from "../../src/dispatch/dispatcher.js";
import { discoverCandidates } from "../../src/dispatch/discover.js";
import { IngestorRegistry } from "../../src/ingestors/registry.js";
import type { DatasetRecord, IngestContext, Ingestor } from "../../src/ingestors/types.js";
import type { IngestConfig } from "../../src/config/types.js";
import { createReport, recordOutcome } from "../../src/dispatch/report.js";
import { AuthenticationError, ExtractionError, StartupConfigError } from "../../src/errors.js";
import { createMemoryLogger, type MemoryLogger } from "../../src/log/logger.js";
import { BASE_URL, clientFor, createFakeSciCat, type FakeSciCat } from "../fixtures/scicat.js";
import {
  makeDir,
  makeTmpDir,
  writeFixture,
  writeIgorLayout,
  writeNexafsLayout,
} from "../fixtures/workspace.js";

// ── Helpers ──

const CREATED = "2024-03-01T10:00:00.000Z";

function configFor(root: string, ingestSpec: string[], extra: Partial<IngestConfig> = {}): IngestConfig {
  return {
    rootFolder: root,
    ingestSpec,
    ownerUsername: "beamline-user",
    scicatUrl: BASE_URL,
    credentials: { username: "ingestor", password: "test-secret" },
    timeoutMs: 1000,
    candidatePattern: "*/",
    dryRun: false,
    ...extra,
  };
}

/** Ingestor accepting directories whose name starts with one of the prefixes */
function fakeIngestor(name: string, prefixes: string[], options: { failExtract?: boolean } = {}) {
  const matches = vi.fn((directory: string) => prefixes.some((p) => basename(directory).startsWith(p)));
  const extract = vi.fn(async (directory: string, ctx: IngestContext): Promise<DatasetRecord> => {
    if (options.failExtract) throw new Error("corrupt header");
    return {
      owner: ctx.ownerUsername,
      datasetName: basename(directory),
      sourceFolder: directory,
      files: [{ path: "frame.fits", size: 10, time: CREATED }],
      scientificMetadata: {},
      creationTime: CREATED,
    };
  });
  const ingestor: Ingestor = { name, description: `${name} test ingestor`, matches, extract };
  return { ingestor, matches, extract };
}

describe("runDispatch", () => {
  let root: string;
  let scicat: FakeSciCat;
  let logger: MemoryLogger;

  beforeEach(() => {
    root = makeTmpDir();
    scicat = createFakeSciCat();
    logger = createMemoryLogger();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  const dispatch = (ingestors: Ingestor[], spec: string[], extra: Partial<IngestConfig> = {}, password?: string) =>
    runDispatch(configFor(root, spec, extra), {
      registry: new IngestorRegistry(ingestors),
      client: clientFor(scicat, { password }),
      logger,
    });

  // ────────────────────────────────────────────────────────────────
  // 1. Candidates and matching
  // ────────────────────────────────────────────────────────────────

  it("does nothing, and never logs in, when the root folder has no subdirectories", async () => {
    writeFixture(root, "stray.txt", "not a dataset");
    const a = fakeIngestor("a", [""]);

    const report = await dispatch([a.ingestor], ["a"]);

    expect(report).toMatchObject({ processed: 0, succeeded: 0, unmatched: 0, extractionFailed: 0, submissionFailed: 0 });
    expect(a.matches).not.toHaveBeenCalled();
    expect(scicat.calls).toEqual([]);
  });

  it("extracts with the only ingestor that accepts a directory", async () => {
    const dir = makeDir(root, "alpha");
    const a = fakeIngestor("a", ["alpha"]);
    const b = fakeIngestor("b", ["beta"]);

    const report = await dispatch([a.ingestor, b.ingestor], ["b", "a"]);

    expect(b.matches).toHaveBeenCalledWith(dir);
    expect(b.extract).not.toHaveBeenCalled();
    expect(a.extract).toHaveBeenCalledTimes(1);
    expect(a.extract.mock.calls[0][0]).toBe(dir);
    expect(a.extract.mock.calls[0][1].ownerUsername).toBe("beamline-user");
    expect(report.datasets).toEqual([
      { directory: dir, ingestor: "a", datasetName: "alpha", pid: "test-prefix/1" },
    ]);
  });

  it("skips a directory no ingestor accepts without extracting or submitting", async () => {
    const dir = makeDir(root, "junk");
    const a = fakeIngestor("a", ["alpha"]);

    const report = await dispatch([a.ingestor], ["a"]);

    expect(report.unmatched).toBe(1);
    expect(report.directories.unmatched).toEqual([dir]);
    expect(a.extract).not.toHaveBeenCalled();
    expect(scicat.calls).toEqual([]);
    expect(logger.lines).toContain(`[WARN] No ingestor accepts ${dir}; skipping`);
  });

  it("gives a directory to the first accepting ingestor in specification order", async () => {
    makeDir(root, "shared");
    const a = fakeIngestor("a", ["shared"]);
    const b = fakeIngestor("b", ["shared"]);

    await dispatch([a.ingestor, b.ingestor], ["b", "a"]);

    expect(b.extract).toHaveBeenCalledTimes(1);
    expect(a.matches).not.toHaveBeenCalled();
    expect(a.extract).not.toHaveBeenCalled();
  });

  it("treats an ingestor whose match check throws as not accepting", async () => {
    const dir = makeDir(root, "alpha");
    const broken: Ingestor = {
      name: "broken",
      description: "always throws",
      matches: () => {
        throw new Error("permission denied");
      },
      extract: vi.fn(),
    };
    const a = fakeIngestor("a", ["alpha"]);

    const report = await dispatch([broken, a.ingestor], ["broken", "a"]);

    expect(report.succeeded).toBe(1);
    expect(logger.lines).toContain(`[WARN] broken could not inspect ${dir}: permission denied`);
  });

  // ────────────────────────────────────────────────────────────────
  // 2. Failures stay with their directory
  // ────────────────────────────────────────────────────────────────

  it("records an extraction failure and carries on", async () => {
    const bad = makeDir(root, "bad-1");
    makeDir(root, "good-1");
    const failing = fakeIngestor("failing", ["bad"], { failExtract: true });
    const good = fakeIngestor("good", ["good"]);

    const report = await dispatch([failing.ingestor, good.ingestor], ["failing", "good"]);

    expect(report).toMatchObject({ processed: 2, succeeded: 1, extractionFailed: 1 });
    expect(report.errors).toEqual([
      { directory: bad, ingestor: "failing", stage: "extraction", message: "corrupt header" },
    ]);
    expect(scicat.datasets.size).toBe(1);
    expect(logger.lines).toContain(`[ERROR] failing could not extract ${bad}: corrupt header`);
  });

  it("records a rejected submission and still submits the other directories", async () => {
    const [s1, s2, s3] = ["s1", "s2", "s3"].map((name) => makeDir(root, name));
    scicat = createFakeSciCat({ rejectDatasets: ["s2"] });
    const a = fakeIngestor("a", ["s"]);

    const report = await dispatch([a.ingestor], ["a"]);

    expect(a.extract).toHaveBeenCalledTimes(3);
    expect(report).toMatchObject({ processed: 3, succeeded: 2, submissionFailed: 1 });
    expect(report.directories.succeeded).toEqual([s1, s3]);
    expect(report.directories.submissionFailed).toEqual([s2]);
    expect(report.errors).toEqual([
      {
        directory: s2,
        ingestor: "a",
        stage: "submission",
        message: "datasets failed with HTTP 500: Internal server error",
        httpStatus: 500,
      },
    ]);
  });

  it("records a timed-out submission as a failure of that directory", async () => {
    makeDir(root, "slow");
    makeDir(root, "swift");
    const stalling = createFakeSciCat();
    scicat = {
      ...stalling,
      fetch: async (input, init) => {
        const body = typeof init?.body === "string" ? init.body : "";
        if (!body.includes('"datasetName":"slow"')) return stalling.fetch(input, init);
        return new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) return;
          signal.addEventListener("abort", () => reject(signal.reason));
        });
      },
    };
    const a = fakeIngestor("a", ["s"]);

    const report = await runDispatch(configFor(root, ["a"]), {
      registry: new IngestorRegistry([a.ingestor]),
      client: clientFor(scicat, { timeoutMs: 20 }),
      logger,
    });

    expect(report).toMatchObject({ succeeded: 1, submissionFailed: 1 });
    expect(report.errors[0].message).toBe("POST /api/v3/datasets timed out after 20ms");
    expect(report.errors[0].httpStatus).toBeUndefined();
  });

  // ────────────────────────────────────────────────────────────────
  // 3. Session
  // ────────────────────────────────────────────────────────────────

  it("logs in once, on the first submission", async () => {
    ["s1", "s2", "s3"].forEach((name) => makeDir(root, name));
    const a = fakeIngestor("a", ["s"]);

    await dispatch([a.ingestor], ["a"]);

    expect(scicat.paths().filter((p) => p === "auth/login")).toHaveLength(1);
    expect(scicat.paths()[0]).toBe("auth/login");
    expect(scicat.datasets.size).toBe(3);
    expect(scicat.datablocks.size).toBe(3);
  });

  it("aborts the run when login is rejected", async () => {
    makeDir(root, "s1");
    makeDir(root, "s2");
    const a = fakeIngestor("a", ["s"]);

    await expect(dispatch([a.ingestor], ["a"], {}, "wrong-secret")).rejects.toBeInstanceOf(AuthenticationError);
    expect(a.extract).toHaveBeenCalledTimes(1);
  });

  it("submits nothing on a dry run", async () => {
    const dir = makeDir(root, "alpha");
    const a = fakeIngestor("a", ["alpha"]);

    const report = await dispatch([a.ingestor], ["a"], { dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.succeeded).toBe(1);
    expect(report.datasets).toEqual([{ directory: dir, ingestor: "a", datasetName: "alpha", pid: undefined }]);
    expect(scicat.calls).toEqual([]);
  });

  // ────────────────────────────────────────────────────────────────
  // 4. Startup checks
  // ────────────────────────────────────────────────────────────────

  it("rejects an unknown ingestor before looking at any directory", async () => {
    makeDir(root, "alpha");
    const a = fakeIngestor("a", ["alpha"]);

    await expect(dispatch([a.ingestor], ["a", "nope"])).rejects.toBeInstanceOf(StartupConfigError);
    expect(a.matches).not.toHaveBeenCalled();
  });

  it("rejects a root folder that has gone missing", async () => {
    const a = fakeIngestor("a", [""]);
    const config = configFor(join(root, "gone"), ["a"]);

    await expect(
      runDispatch(config, { registry: new IngestorRegistry([a.ingestor]), client: clientFor(scicat), logger })
    ).rejects.toThrow(`Invalid configuration: root folder does not exist: ${join(root, "gone")}`);
  });

  // ────────────────────────────────────────────────────────────────
  // 5. Built-in ingestors end to end
  // ────────────────────────────────────────────────────────────────

  it("registers recognised 11.0.1.2 folders and skips the rest", async () => {
    const igor = writeIgorLayout(root, "PS_film");
    const nexafs = writeNexafsLayout(root, "PS_nexafs");
    const junk = makeDir(root, "junk");
    scicat.datasets.set("scan-1", { datasetName: "PS film" });

    const report = await runDispatch(configFor(root, ["als_11012_igor", "als_11012_nexafs"]), {
      client: clientFor(scicat),
      logger,
    });

    expect(report.directories).toEqual({
      succeeded: [igor, nexafs],
      unmatched: [junk],
      extractionFailed: [],
      submissionFailed: [],
    });
    expect(report.datasets.map((d) => d.datasetName)).toEqual(["PS_film_IGOR_ANALYSIS", "PS_nexafs"]);
    expect(scicat.datasets.get("test-prefix/1")).toMatchObject({
      owner: "beamline-user",
      ownerGroup: "beamline-user",
      accessGroups: ["11.0.1.2", "beamline-user"],
      sourceFolder: join(igor, "dat"),
      numberOfFiles: 2,
      type: "derived",
      inputDatasets: ["scan-1"],
    });
    expect(scicat.attachments.get("test-prefix/1")).toMatchObject({ caption: "scattering image" });
    expect(scicat.datasets.get("test-prefix/2")).toMatchObject({ type: "raw", datasetName: "PS_nexafs" });
  });

  it("extracts a folder holding a dangling symbolic link on a dry run", async () => {
    const nexafs = writeNexafsLayout(root, "PS_nexafs");
    symlinkSync(join(nexafs, "gone.bin"), join(nexafs, "link.bin"));

    const report = await runDispatch(configFor(root, ["als_11012_nexafs"], { dryRun: true }), {
      client: clientFor(scicat),
      logger,
    });

    expect(report).toMatchObject({ processed: 1, succeeded: 1, extractionFailed: 0 });
    expect(logger.lines).toContain(`[WARN] Skipping symbolic link ${join(nexafs, "link.bin")}`);
    expect(logger.lines).toContain('[INFO] Dry run: extracted "PS_nexafs" (2 files)');
  });
});

// ────────────────────────────────────────────────────────────────
// discoverCandidates
// ────────────────────────────────────────────────────────────────

describe("discoverCandidates", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("returns immediate non-hidden subdirectories, sorted, as absolute paths", async () => {
    makeDir(root, "b-sample");
    makeDir(root, "a-sample/nested");
    makeDir(root, ".cache");
    writeFixture(root, "readme.txt", "x");

    expect(await discoverCandidates(root)).toEqual([join(root, "a-sample"), join(root, "b-sample")]);
  });

  it("follows a custom pattern", async () => {
    makeDir(root, "2024/run-1");
    makeDir(root, "2024/run-2");
    makeDir(root, "2025");

    expect(await discoverCandidates(root, "*/*/")).toEqual([join(root, "2024/run-1"), join(root, "2024/run-2")]);
  });

  it("never returns the root folder itself", async () => {
    makeDir(root, "2024/run-1");

    expect(await discoverCandidates(root, "**/")).toEqual([join(root, "2024"), join(root, "2024/run-1")]);
  });
});

// ────────────────────────────────────────────────────────────────
// recordOutcome
// ────────────────────────────────────────────────────────────────

describe("recordOutcome", () => {
  it("reports an extraction failure with the reason its error carries", () => {
    const report = createReport();
    const error = new ExtractionError("/data/alpha", "als_11012_igor", new Error("no dat files"));

    recordOutcome(report, { status: "extraction-failed", directory: "/data/alpha", error });

    expect(report).toMatchObject({ processed: 1, extractionFailed: 1 });
    expect(report.directories.extractionFailed).toEqual(["/data/alpha"]);
    expect(report.errors).toEqual([
      { directory: "/data/alpha", ingestor: "als_11012_igor", stage: "extraction", message: "no dat files" },
    ]);
  });
});
