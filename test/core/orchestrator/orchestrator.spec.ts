// test/core/orchestrator/orchestrator.spec.ts
// End-to-end compilation runs with in-process capabilities

import { describe, it, expect } from "vitest";
import { CompilationOrchestrator, nextVersion } from "../../../src/core/orchestrator/orchestrator";
import { TokenCompiler } from "../../../src/core/compiler/tokenCompiler";
import { InMemoryArtifactCache } from "../../../src/core/artifacts/cache";
import { InMemoryNarrativeStore } from "../../../src/core/store/narrativeStore";
import { NarrativeSyntaxError, CyclicDependencyError, VersionConflictError } from "../../../src/core/errors";
import type { GenerationCapability } from "../../../src/core/generation/types";
import type { CompilationReport } from "../../../src/core/orchestrator/orchestrator";
import { RecordingGenerator, TARGET, fenced, markerValidator } from "../../helpers/fixtures";

function setup(
  generator: GenerationCapability,
  options: { maxConcurrency?: number; generationRetries?: number; maxAttempts?: number } = {}
) {
  const store = new InMemoryNarrativeStore();
  const cache = new InMemoryArtifactCache();
  const compiler = new TokenCompiler({
    generator,
    validator: markerValidator(),
    cache,
    store,
    target: TARGET,
    maxAttempts: options.maxAttempts ?? 2,
  });
  const orchestrator = new CompilationOrchestrator({
    compiler,
    store,
    maxConcurrency: options.maxConcurrency ?? 4,
    generationRetries: options.generationRetries ?? 0,
  });
  return { orchestrator, store, cache, compiler };
}

function statuses(report: CompilationReport): Record<string, string> {
  return Object.fromEntries(report.tokens.map((t) => [t.name, t.status]));
}

const SCENE = "[Scene:S1]\nHello\n[Component:C1]\nWorld\n[Function:F1]\nDo it\n";

const CHAIN = [
  "[Function:F0]",
  "base",
  "[Function:F1]",
  "REF:F0",
  "v1",
  "[Function:F2]",
  "REF:F1",
  "[Function:F3]",
  "independent",
  "",
].join("\n");

describe("CompilationOrchestrator", () => {
  it("compiles every token of a fresh document", async () => {
    const generator = new RecordingGenerator();
    const { orchestrator } = setup(generator);

    const report = await orchestrator.compileText("doc", SCENE);

    expect(report.version).toBe("v1");
    expect(report.tokens.map((t) => t.name)).toEqual(["S1", "C1", "F1"]);
    expect(report.counts).toEqual({ compiled: 3, repaired: 0, cached: 0, failed: 0, skipped: 0, errored: 0, cancelled: 0 });
    expect(report.usage.totalTokens).toBe(45);
    expect(generator.callCount).toBe(3);
    expect(report.superseded).toBe(false);
    expect(report.cancelled).toBe(false);
  });

  it("passes a dependency's artifact to its dependent", async () => {
    const generator = new RecordingGenerator();
    const { orchestrator } = setup(generator);

    const report = await orchestrator.compileText("doc", "[Function:A]\n...\n[Function:B]\nREF:A\n...\n");

    expect(report.tokens.map((t) => t.name)).toEqual(["A", "B"]);
    const [request] = generator.callsFor("B");
    expect(request.context.dependencies).toEqual([{ name: "A", kind: "Function", code: "export const A = 1;" }]);
    expect(generator.events.indexOf("end:A")).toBeLessThan(generator.events.indexOf("start:B"));
  });

  it("recompiles unchanged text from the cache with zero generation calls", async () => {
    const generator = new RecordingGenerator();
    const { orchestrator } = setup(generator);

    await orchestrator.compileText("doc", CHAIN);
    const calls = generator.callCount;
    const again = await orchestrator.compileText("doc", CHAIN);

    expect(generator.callCount).toBe(calls);
    expect(again.version).toBe("v2");
    expect(again.counts.cached).toBe(4);
    expect(again.tokens.every((t) => t.artifact?.cacheHit === true)).toBe(true);
    expect(again.usage.totalTokens).toBe(0);
  });

  it("recompiles only the edited token and its transitive dependents", async () => {
    const generator = new RecordingGenerator();
    const { orchestrator } = setup(generator);
    await orchestrator.compileText("doc", CHAIN);

    const ingested = await orchestrator.ingest("doc", CHAIN.replace("v1", "v2"));
    expect(ingested.diff.changed).toEqual(["function:F1"]);
    expect([...ingested.dirty].sort()).toEqual(["function:F1", "function:F2"]);

    const report = await orchestrator.compile("doc");
    expect(statuses(report)).toEqual({ F0: "cached", F1: "compiled", F2: "compiled", F3: "cached" });
    expect(generator.callsFor("F1")).toHaveLength(2);
    expect(generator.callsFor("F0")).toHaveLength(1);
    expect(generator.callsFor("F3")).toHaveLength(1);
  });

  it("skips dependents of a failed token without generating them", async () => {
    const generator = new RecordingGenerator((request) =>
      request.context.tokenName === "A" ? fenced("INVALID") : fenced(`export const ${request.context.tokenName} = 1;`)
    );
    const { orchestrator } = setup(generator, { maxAttempts: 2 });

    const report = await orchestrator.compileText(
      "doc",
      "[Function:A]\n[Function:B]\nREF:A\n[Function:C]\nREF:B\n[Function:D]\n"
    );

    expect(statuses(report)).toEqual({ A: "failed", B: "skipped", C: "skipped", D: "compiled" });
    expect(generator.callsFor("A")).toHaveLength(2);
    expect(generator.callsFor("B")).toHaveLength(0);
    expect(generator.callsFor("C")).toHaveLength(0);
    expect(report.tokens.find((t) => t.name === "B")?.error).toBe("Dependencies not valid: A");
    expect(report.tokens.find((t) => t.name === "A")?.diagnostics).toEqual(["marker found"]);
  });

  it("marks a token repaired when it validates after a retry", async () => {
    const generator = new RecordingGenerator((_request, index) => (index === 0 ? fenced("INVALID") : fenced("export const A = 1;")));
    const { orchestrator } = setup(generator, { maxAttempts: 3 });

    const report = await orchestrator.compileText("doc", "[Function:A]\n");
    expect(report.tokens[0].status).toBe("repaired");
    expect(report.tokens[0].attempts).toBe(2);
    expect(report.counts.repaired).toBe(1);
  });

  it("isolates a generation failure to the token and its dependents", async () => {
    const generator = new RecordingGenerator((request) => {
      if (request.context.tokenName === "A") throw new Error("connection reset");
      return fenced(`export const ${request.context.tokenName} = 1;`);
    });
    const { orchestrator } = setup(generator);

    const report = await orchestrator.compileText("doc", "[Function:A]\n[Function:B]\nREF:A\n[Function:C]\n");

    expect(statuses(report)).toEqual({ A: "errored", B: "skipped", C: "compiled" });
    expect(report.tokens[0].error).toBe("Generation failed: connection reset");
  });

  it("retries a token's compilation after a generation failure", async () => {
    let failures = 1;
    const generator = new RecordingGenerator((request) => {
      if (failures > 0) {
        failures--;
        throw new Error("flaky");
      }
      return fenced(`export const ${request.context.tokenName} = 1;`);
    });
    const { orchestrator } = setup(generator, { generationRetries: 1 });

    const report = await orchestrator.compileText("doc", "[Function:A]\n");
    expect(report.tokens[0].status).toBe("compiled");
    expect(generator.callCount).toBe(2);
  });

  it("keeps at most maxConcurrency compilations in flight", async () => {
    const generator = new RecordingGenerator(undefined, 10);
    const { orchestrator } = setup(generator, { maxConcurrency: 2 });

    const text = ["A", "B", "C", "D", "E", "F"].map((n) => `[Function:${n}]\n${n}\n`).join("");
    const report = await orchestrator.compileText("doc", text);

    expect(report.counts.compiled).toBe(6);
    expect(generator.maxActive).toBe(2);
  });

  it("stops starting tokens when the signal aborts", async () => {
    const controller = new AbortController();
    const generator = new RecordingGenerator((request) => {
      controller.abort();
      return fenced(`export const ${request.context.tokenName} = 1;`);
    });
    const { orchestrator } = setup(generator, { maxConcurrency: 1 });
    const text = "[Function:A]\n[Function:B]\n[Function:C]\n";

    const report = await orchestrator.compileText("doc", text, undefined, { signal: controller.signal });
    expect(statuses(report)).toEqual({ A: "compiled", B: "cancelled", C: "cancelled" });
    expect(report.cancelled).toBe(true);

    const resumed = await orchestrator.compile("doc");
    expect(statuses(resumed)).toEqual({ A: "cached", B: "compiled", C: "compiled" });
    expect(generator.callCount).toBe(3);
  });

  it("lets a newer ingest supersede a running compilation", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let started: () => void = () => {};
    const firstCall = new Promise<void>((resolve) => {
      started = resolve;
    });
    const generator = new RecordingGenerator(async (request, index) => {
      if (index === 0) {
        started();
        await gate;
      }
      return fenced(`export const ${request.context.tokenName} = 1;`);
    });
    const { orchestrator } = setup(generator, { maxConcurrency: 1 });

    await orchestrator.ingest("doc", "[Function:A]\n[Function:B]\nold\n");
    const running = orchestrator.compile("doc");
    await firstCall;
    await orchestrator.ingest("doc", "[Function:A]\n[Function:B]\nnew\n");
    release();

    const stale = await running;
    expect(stale.version).toBe("v1");
    expect(stale.superseded).toBe(true);
    expect(statuses(stale)).toEqual({ A: "compiled", B: "cancelled" });

    const current = await orchestrator.compile("doc");
    expect(current.version).toBe("v2");
    expect(statuses(current)).toEqual({ A: "cached", B: "compiled" });
    expect(generator.callCount).toBe(2);
  });

  it("cancel() stops scheduling for a document", async () => {
    let orchestrator: CompilationOrchestrator | undefined;
    const generator = new RecordingGenerator((request) => {
      orchestrator?.cancel("doc");
      return fenced(`export const ${request.context.tokenName} = 1;`);
    });
    orchestrator = setup(generator, { maxConcurrency: 1 }).orchestrator;

    const report = await orchestrator.compileText("doc", "[Function:A]\n[Function:B]\n");
    expect(statuses(report)).toEqual({ A: "compiled", B: "cancelled" });
    expect(report.superseded).toBe(true);
  });

  it("recompiles everything with bypassCache", async () => {
    const generator = new RecordingGenerator();
    const { orchestrator } = setup(generator);

    await orchestrator.compileText("doc", SCENE);
    const forced = await orchestrator.compile("doc", { bypassCache: true });

    expect(forced.counts.compiled).toBe(3);
    expect(generator.callCount).toBe(6);
  });

  it("fails fast on syntax and graph errors before saving anything", async () => {
    const { orchestrator, store } = setup(new RecordingGenerator());

    await expect(orchestrator.ingest("doc", "[Function:A] trailing\n")).rejects.toBeInstanceOf(NarrativeSyntaxError);
    await expect(orchestrator.ingest("doc", "[Function:A]\nREF:B\n[Function:B]\nREF:A\n")).rejects.toBeInstanceOf(
      CyclicDependencyError
    );
    expect(await store.loadDocument("doc")).toBeNull();
    expect(await store.loadTokens("doc")).toEqual([]);
  });

  it("soft-retires removed tokens and supersedes the prior version", async () => {
    const { orchestrator, store } = setup(new RecordingGenerator());

    await orchestrator.ingest("doc", "[Function:A]\n[Function:B]\n");
    const second = await orchestrator.ingest("doc", "[Function:A]\n");

    expect(second.diff.removed).toEqual(["function:B"]);
    expect((await store.loadTokens("doc")).map((t) => t.id)).toEqual(["function:A"]);
    expect(store.allTokens("doc").find((t) => t.id === "function:B")?.retired).toBe(true);
    expect((await store.loadVersions("doc")).map((d) => [d.version, d.supersededBy])).toEqual([
      ["v1", "v2"],
      ["v2", undefined],
    ]);
  });

  it("restores a document from the store in a new orchestrator", async () => {
    const generator = new RecordingGenerator();
    const { orchestrator, store, cache, compiler } = setup(generator);
    await orchestrator.compileText("doc", SCENE);

    const restarted = new CompilationOrchestrator({ compiler, store, maxConcurrency: 1 });
    const report = await restarted.compile("doc");

    expect(report.counts.cached).toBe(3);
    expect(generator.callCount).toBe(3);
    expect(cache.size()).toBe(3);
    await expect(restarted.compile("missing")).rejects.toThrow("Unknown document: missing");
  });

  it("labels versions", async () => {
    const { orchestrator } = setup(new RecordingGenerator());
    const first = await orchestrator.ingest("doc", "[Function:A]\n", "draft");
    const second = await orchestrator.ingest("doc", "[Function:A]\n");

    expect(first.document.version).toBe("draft");
    expect(second.document.version).toBe("draft.1");
    expect(nextVersion("v9")).toBe("v10");
    expect(nextVersion(undefined)).toBe("v1");
  });

  it("rejects an explicit label naming an older version", async () => {
    const { orchestrator, store } = setup(new RecordingGenerator());
    await orchestrator.ingest("doc", "[Function:A]\n");
    await orchestrator.ingest("doc", "[Function:A]\n[Function:B]\n", "v2");

    await expect(orchestrator.ingest("doc", "[Function:C]\n", "v1")).rejects.toBeInstanceOf(VersionConflictError);

    expect((await store.loadDocument("doc"))?.version).toBe("v2");
    expect((await store.loadTokens("doc")).map((t) => t.id)).toEqual(["function:A", "function:B"]);
    expect((await store.loadVersions("doc")).map((d) => d.version)).toEqual(["v1", "v2"]);
  });

  it("replaces the latest version when its label is given again", async () => {
    const { orchestrator, store } = setup(new RecordingGenerator());
    await orchestrator.ingest("doc", "[Function:A]\n", "draft");
    const again = await orchestrator.ingest("doc", "[Function:A]\n[Function:B]\n", "draft");

    expect(again.diff.added).toEqual(["function:B"]);
    expect((await store.loadVersions("doc")).map((d) => [d.version, d.supersededBy])).toEqual([["draft", undefined]]);
  });

  it("skips labels already taken when numbering versions", async () => {
    const { orchestrator } = setup(new RecordingGenerator());
    await orchestrator.ingest("doc", "[Function:A]\n", "v2");
    await orchestrator.ingest("doc", "[Function:A]\n", "v1");
    const next = await orchestrator.ingest("doc", "[Function:A]\n");

    expect(next.document.version).toBe("v3");
  });

  it("applies overlapping ingests of one document in call order", async () => {
    const { orchestrator, store } = setup(new RecordingGenerator());
    const textA = "[Function:A]\n";
    const textAB = "[Function:A]\n[Function:B]\n";
    const textAC = "[Function:A]\n[Function:C]\n";
    await orchestrator.ingest("doc", textA);

    const [b, c] = await Promise.all([orchestrator.ingest("doc", textAB), orchestrator.ingest("doc", textAC)]);

    expect(b.document.version).toBe("v2");
    expect(b.diff.added).toEqual(["function:B"]);
    expect(c.document.version).toBe("v3");
    expect(c.diff.added).toEqual(["function:C"]);
    expect(c.diff.removed).toEqual(["function:B"]);
    expect(c.diff.unchanged).toEqual(["function:A"]);
    expect((await store.loadTokens("doc")).map((t) => t.id)).toEqual(["function:A", "function:C"]);
    expect((await store.loadVersions("doc")).map((d) => [d.version, d.supersededBy, d.text])).toEqual([
      ["v1", "v2", textA],
      ["v2", "v3", textAB],
      ["v3", undefined, textAC],
    ]);
  });

  it("keeps the ingest queue moving after a rejected ingest", async () => {
    const { orchestrator } = setup(new RecordingGenerator());
    await orchestrator.ingest("doc", "[Function:A]\n");
    await orchestrator.ingest("doc", "[Function:A]\n", "v2");

    const [conflict, next] = await Promise.allSettled([
      orchestrator.ingest("doc", "[Function:B]\n", "v1"),
      orchestrator.ingest("doc", "[Function:C]\n"),
    ]);

    expect(conflict.status).toBe("rejected");
    expect(next.status === "fulfilled" ? next.value.document.version : null).toBe("v3");
  });

  it("rebuilds dependents of a force-recompiled token", async () => {
    let aCalls = 0;
    const generator = new RecordingGenerator((request) => {
      if (request.context.tokenName === "A") {
        aCalls++;
        return fenced(`export const A = ${aCalls};`);
      }
      return fenced("export const B = 1;");
    });
    const { orchestrator } = setup(generator);
    const text = "[Function:A]\n[Function:B]\nREF:A\n";
    await orchestrator.compileText("doc", text);

    const forced = await orchestrator.compile("doc", { bypassCache: true });
    expect(statuses(forced)).toEqual({ A: "compiled", B: "compiled" });
    expect(generator.callsFor("B")[1].context.dependencies).toEqual([{ name: "A", kind: "Function", code: "export const A = 2;" }]);

    const after = await orchestrator.compile("doc");
    expect(statuses(after)).toEqual({ A: "cached", B: "cached" });
    expect(after.tokens[0].artifact?.code).toBe("export const A = 2;");
    expect(generator.callCount).toBe(4);
  });

  it("recompiles a dependent left behind by an aborted forced run", async () => {
    let aCalls = 0;
    const controller = new AbortController();
    const generator = new RecordingGenerator((request) => {
      if (request.context.tokenName === "A") {
        aCalls++;
        if (aCalls === 2) controller.abort();
        return fenced(`export const A = ${aCalls};`);
      }
      return fenced("export const B = 1;");
    });
    const { orchestrator } = setup(generator, { maxConcurrency: 1 });
    await orchestrator.compileText("doc", "[Function:A]\n[Function:B]\nREF:A\n");

    const aborted = await orchestrator.compile("doc", { bypassCache: true, signal: controller.signal });
    expect(statuses(aborted)).toEqual({ A: "compiled", B: "cancelled" });

    const resumed = await orchestrator.compile("doc");
    expect(statuses(resumed)).toEqual({ A: "cached", B: "compiled" });
    expect(resumed.tokens[0].artifact?.code).toBe("export const A = 2;");
    expect(generator.callsFor("B")[1].context.dependencies).toEqual([{ name: "A", kind: "Function", code: "export const A = 2;" }]);
    expect(generator.callsFor("A")).toHaveLength(2);
    expect(generator.callsFor("B")).toHaveLength(2);
  });

  it("reports a terminally failed token from its stored artifact on unchanged text", async () => {
    const generator = new RecordingGenerator((request) =>
      request.context.tokenName === "A" ? fenced("INVALID") : fenced(`export const ${request.context.tokenName} = 1;`)
    );
    const { orchestrator } = setup(generator, { maxAttempts: 2 });
    const text = "[Function:A]\n[Function:B]\nREF:A\n";
    await orchestrator.compileText("doc", text);
    expect(generator.callCount).toBe(2);

    const again = await orchestrator.compileText("doc", text);

    expect(statuses(again)).toEqual({ A: "failed", B: "skipped" });
    expect(generator.callCount).toBe(2);
    expect(again.usage.totalTokens).toBe(0);
  });
});
