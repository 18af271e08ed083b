// test/runtime.spec.ts
// Tests for wiring the engine from a configuration

import { describe, it, expect } from "vitest";
import { createNarrativeCompiler } from "../src/runtime";
import { mergeConfigs } from "../src/core/config/config";
import { ConfigError } from "../src/core/errors";
import { ScriptedGenerationAdapter } from "../src/core/generation/scripted";
import type { LogSink } from "../src/core/log";
import { fenced } from "./helpers/fixtures";

describe("createNarrativeCompiler", () => {
  it("compiles a document end to end with an injected generator", async () => {
    const generator = new ScriptedGenerationAdapter({ responses: [fenced("export const A = 1;")] });
    const lines: string[] = [];
    const sink: LogSink = (level, msg) => lines.push(`${level} ${msg}`);

    const narrc = createNarrativeCompiler(mergeConfigs(), { generator, logSink: sink });
    const report = await narrc.compileText("doc-1", "[Function:A]\nreturn one\n");

    expect(report.counts.compiled).toBe(1);
    expect(report.tokens[0].artifact?.code).toBe("export const A = 1;");
    expect(narrc.target).toEqual({ language: "typescript", framework: "angular" });
    expect(narrc.cache.size()).toBe(1);
    expect(lines[0]).toBe("info ingested doc-1@v1: +1 ~0 -0 =0, 1 dirty");
  });

  it("uses the TypeScript checker for TypeScript targets", async () => {
    const generator = new ScriptedGenerationAdapter({ responses: [fenced("export const = ;"), fenced("export const A = 1;")] });
    const config = mergeConfigs({ compiler: { logLevel: "silent" } });

    const report = await createNarrativeCompiler(config, { generator }).compileText("doc-1", "[Function:A]\n");
    expect(report.tokens[0].status).toBe("repaired");
    expect(generator.callCount).toBe(2);
  });

  it("scores valid artifacts with the evaluator capability", async () => {
    const generator = new ScriptedGenerationAdapter({ responses: [fenced("export const A = 1;")] });
    const evaluator = new ScriptedGenerationAdapter({ responses: ['{"score": 9, "feedback": "Fine"}'] });
    const narrc = createNarrativeCompiler(mergeConfigs({ compiler: { logLevel: "silent" } }), { generator, evaluator });

    const scores = await narrc.evaluate(await narrc.compileText("doc-1", "[Function:A]\n"));

    expect([...scores.keys()]).toEqual(["function:A"]);
    expect(scores.get("function:A")).toMatchObject({ score: 9, feedback: "Fine" });
    expect(evaluator.requests[0].userContent).toContain('"document": "doc-1"');
  });

  it("requires an API key when no generator is injected", () => {
    expect(() => createNarrativeCompiler(mergeConfigs())).toThrow(ConfigError);
  });

  it("builds the configured provider adapter", () => {
    const config = mergeConfigs({ llm: { apiKey: "test-secret" }, compiler: { logLevel: "silent" } });
    const narrc = createNarrativeCompiler(config);
    expect(narrc.config.llm.provider).toBe("openai");
    expect(narrc.config.llm.model).toBe("gpt-4o-mini");
  });

  it("rejects an invalid configuration", () => {
    const generator = new ScriptedGenerationAdapter({ responses: [] });
    expect(() => createNarrativeCompiler(mergeConfigs({ compiler: { maxConcurrency: 0 } }), { generator })).toThrow(
      "Invalid configuration: maxConcurrency must be an integer of at least 1"
    );
  });
});
