#!/usr/bin/env node

import { Command } from "commander";
import { getConfig } from "./config";
import { createPipelineFromConfig, type Pipeline } from "./services/pipeline/pipeline";
import { toApiResult } from "./services/pipeline/result.api";
import { PlanningError } from "./services/plans/planner";
import { formatIssues } from "./services/plans/plan.validate";
import type { PipelineResult } from "./types/plan";
import { createLogger } from "./utils/logger";

export const EXIT_COMPLETE = 0;
export const EXIT_INCOMPLETE = 1;
export const EXIT_PLANNING_FAILED = 2;
export const EXIT_UNEXPECTED = 3;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function bulletList(title: string, items: readonly string[]): string[] {
  return items.length > 0 ? [title, ...items.map((item) => `  - ${item}`)] : [];
}

export function renderTextReport(result: PipelineResult): string {
  const { verification } = result;
  return [
    verification.formattedOutput,
    "",
    `Summary: ${verification.summary}`,
    `Complete: ${verification.isComplete ? "yes" : "no"}`
      + `  Correct: ${verification.isCorrect ? "yes" : "no"}`
      + `  Confidence: ${verification.confidenceScore.toFixed(2)}`,
    ...bulletList("Issues:", verification.issues),
    ...bulletList("Recommendations:", verification.recommendations),
    `Time: ${(result.timings.totalMs / 1000).toFixed(1)}s`,
    "",
  ].join("\n");
}

export function buildProgram(
  createPipeline: () => Pipeline,
  io: CliIo = processIo,
): Command {
  const program = new Command();

  program
    .name("ops-assistant")
    .description("Plan, execute and verify natural-language operations queries")
    .version("0.1.0");

  program
    .command("ask")
    .description("Answer a query with the plan-execute-verify pipeline")
    .argument("<query>", "Natural-language request")
    .option("--json", "Print the full result as JSON")
    .option("--timeout <ms>", "Abort the invocation after this many milliseconds")
    .action(async (query: string, opts: { json?: true; timeout?: string }) => {
      const timeoutMs = opts.timeout === undefined ? undefined : Number.parseInt(opts.timeout, 10);
      if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
        io.stderr("Error: --timeout must be a positive integer\n");
        io.setExitCode(EXIT_UNEXPECTED);
        return;
      }

      try {
        const result = await createPipeline().processQuery(query, { timeoutMs });
        io.stdout(opts.json
          ? `${JSON.stringify(toApiResult(result), null, 2)}\n`
          : renderTextReport(result));
        io.setExitCode(result.verification.isComplete ? EXIT_COMPLETE : EXIT_INCOMPLETE);
      } catch (err) {
        if (err instanceof PlanningError) {
          io.stderr(`Error: ${err.code}: ${err.message}\n`);
          for (const line of formatIssues(err.issues)) {
            io.stderr(`  ${line}\n`);
          }
          io.setExitCode(EXIT_PLANNING_FAILED);
          return;
        }

        const message = err instanceof Error ? err.message : String(err);
        io.stderr(`Error: ${message}\n`);
        io.setExitCode(EXIT_UNEXPECTED);
      }
    });

  return program;
}

if (require.main === module) {
  const config = getConfig();
  const program = buildProgram(() =>
    createPipelineFromConfig(config, createLogger(config, { stderr: true })));
  program.parseAsync().catch((err: unknown) => {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = EXIT_UNEXPECTED;
  });
}
