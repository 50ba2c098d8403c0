#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { CacheStore } from "./cache-store";
import { LlmParentMatcher } from "./camera-matcher";
import { describeCameraTree, heuristicParentMatcher, type ParentMatcher } from "./camera-tree";
import { loadConfig, type FrameChainConfig } from "./config";
import { RunFailedError, extractErrorMessage } from "./errors";
import { describePlan, planRun, previewRun, runPipeline } from "./pipeline";
import { createChatModel, createGateway, createGenerationServices } from "./providers";
import type { RemoteGateway } from "./remote";
import { RunEventLog } from "./run-events";
import { isInterrupted, setInterrupted } from "./signals";
import { loadShotList } from "./shot-list";
import { loadRunReport } from "./tools/state";

const program = new Command();

// SIGINT handler for graceful interruption
process.on("SIGINT", () => {
  if (isInterrupted()) {
    console.log("\nInterrupted again. Exiting.");
    process.exit(130);
  }
  console.log("\nInterrupted. Letting running tasks finish; no new tasks will start. Press Ctrl+C again to exit now.");
  setInterrupted(true);
});

function createMatcher(config: FrameChainConfig, gateway: RemoteGateway): ParentMatcher {
  return config.cameraMatcher === "llm"
    ? new LlmParentMatcher(createChatModel(config), gateway)
    : heuristicParentMatcher;
}

function fail(error: unknown): never {
  console.error(`Error: ${extractErrorMessage(error)}`);
  if (error instanceof RunFailedError) {
    console.error("Resume with the same command; finished artifacts are kept in the working directory.");
  }
  process.exit(1);
}

program
  .name("framechain")
  .description("Generate keyframes and shot videos for a shot list, in dependency order")
  .version("0.1.0");

program
  .command("run")
  .description("Generate every missing frame and video")
  .argument("<shots-file>", "Path to the shot list (JSON)")
  .option("--config <file>", "Configuration file (JSON)")
  .option("--working-dir <dir>", "Working directory for artifacts")
  .option("--target <ids...>", "Only these tasks (e.g. 3:shot_video) and their prerequisites")
  .option("--dry-run", "Build the camera tree and print the task plan without generating", false)
  .option("--verbose", "Log every task state transition", false)
  .action(async (shotsFile: string, options: { config?: string; workingDir?: string; target?: string[]; dryRun: boolean; verbose: boolean }) => {
    try {
      const config = await loadConfig(options.config, { workingDir: options.workingDir, verbose: options.verbose || undefined });
      const shots = await loadShotList(shotsFile);
      const cache = new CacheStore(config.workingDir);
      const gateway = createGateway(config);
      const matcher = createMatcher(config, gateway);

      console.log("Frame Chain");
      console.log("===========");
      console.log(`Shot list: ${shotsFile} (${shots.length} shots)`);
      console.log(`Working directory: ${config.workingDir}`);
      console.log(`Image: ${config.imageGenerator.provider}, video: ${config.videoGenerator.provider}, camera matcher: ${config.cameraMatcher}`);
      console.log(`Dry run: ${options.dryRun}`);
      console.log("");

      if (options.dryRun) {
        const plan = await planRun(shots, { cache, matcher }, options.target);
        console.log(describeCameraTree(plan.cameras).join("\n"));
        console.log("");
        console.log((await describePlan(plan.graph, cache)).join("\n"));
        console.log("\n[dry-run] Generation skipped.");
        return;
      }

      const events = new RunEventLog();
      if (config.verbose) {
        events.subscribe((event) => {
          if (event.type === "run_status") {
            console.log(`[run] ${event.payload.status}${event.payload.error ? `: ${event.payload.error}` : ""}`);
          }
        });
      }

      await runPipeline(shots, {
        cache,
        gateway,
        services: createGenerationServices(config, cache, isInterrupted),
        matcher,
        events,
        isInterrupted,
      }, { targets: options.target, verbose: config.verbose });
    } catch (error) {
      fail(error);
    }
  });

program
  .command("tree")
  .description("Build, verify and print the camera tree")
  .argument("<shots-file>", "Path to the shot list (JSON)")
  .option("--config <file>", "Configuration file (JSON)")
  .option("--working-dir <dir>", "Working directory for artifacts")
  .action(async (shotsFile: string, options: { config?: string; workingDir?: string }) => {
    try {
      const config = await loadConfig(options.config, { workingDir: options.workingDir });
      const shots = await loadShotList(shotsFile);
      const cache = new CacheStore(config.workingDir);
      const { cameras } = await planRun(shots, { cache, matcher: createMatcher(config, createGateway(config)) });
      console.log(describeCameraTree(cameras).join("\n"));
    } catch (error) {
      fail(error);
    }
  });

program
  .command("status")
  .description("Show each planned task and whether its artifact is cached")
  .argument("<shots-file>", "Path to the shot list (JSON)")
  .option("--config <file>", "Configuration file (JSON)")
  .option("--working-dir <dir>", "Working directory for artifacts")
  .action(async (shotsFile: string, options: { config?: string; workingDir?: string }) => {
    try {
      const config = await loadConfig(options.config, { workingDir: options.workingDir });
      const shots = await loadShotList(shotsFile);
      const cache = new CacheStore(config.workingDir);
      const plan = await previewRun(shots, cache);
      console.log((await describePlan(plan.graph, cache)).join("\n"));

      const report = await loadRunReport(cache);
      if (report) {
        console.log("");
        console.log(`Last run finished ${report.finishedAt}: ${report.tasks.length} tasks, ${report.failures.length} failed, ${report.generatorCalls} generator calls`);
        for (const failure of report.failures) {
          console.log(`  ${failure.id}: ${failure.error ?? "unknown error"}`);
        }
      }
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
