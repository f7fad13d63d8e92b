/**
 * CLI front end
 *
 * Parses arguments, applies saved defaults, checks the tools and runs one
 * batch. SIGINT cancels the batch. Resolves with the process exit code.
 */

import type { BatchSummary } from "@pptmp4/types";
import { AppError, getErrorMessage } from "../core/app-error";
import { getDefaultOutputDirectory } from "../config/paths";
import { getSettings, saveSettings } from "../config/store";
import type { AppSettings } from "../config/types";
import { BatchOrchestrator } from "../managers/batch";
import { ConversionRunner, createDefaultRunnerDependencies, type JobRunner } from "../managers/conversion";
import { getFFmpegPath, getFFprobePath, verifyTool, type ToolCheckResult } from "../utils/ffmpeg";
import { logger } from "../utils/logger";
import { HELP_TEXT, parseCommandLine, resolveOptions, settingsFromInput } from "./args";
import { ProgressReporter, type OutputStream } from "./progress-reporter";

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  CANCELLED: 130,
} as const;

export interface ToolPaths {
  ffmpegPath: string;
  ffprobePath: string;
}

export interface CliDependencies {
  stdout: OutputStream;
  stderr: OutputStream;
  interactive: boolean;
  getSettings: () => AppSettings;
  saveSettings: (updates: Partial<AppSettings>) => void;
  defaultOutputDirectory: () => string;
  resolveTools: (settings: AppSettings) => ToolPaths;
  verifyTool: (tool: string, toolPath: string) => Promise<ToolCheckResult>;
  createRunner: (tools: ToolPaths) => JobRunner;
  /** Register an interrupt handler; returns the unregister function */
  onInterrupt: (handler: () => void) => () => void;
}

function defaultDependencies(): CliDependencies {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    interactive: process.stdout.isTTY === true,
    getSettings,
    saveSettings,
    defaultOutputDirectory: getDefaultOutputDirectory,
    resolveTools: (settings) => ({
      ffmpegPath: getFFmpegPath(settings.ffmpegPath),
      ffprobePath: getFFprobePath(settings.ffprobePath),
    }),
    verifyTool: (tool, toolPath) => verifyTool(tool, toolPath),
    createRunner: ({ ffmpegPath, ffprobePath }) =>
      new ConversionRunner(createDefaultRunnerDependencies(ffmpegPath, ffprobePath)),
    onInterrupt: (handler) => {
      process.on("SIGINT", handler);
      return () => {
        process.off("SIGINT", handler);
      };
    },
  };
}

export function exitCodeFor(summary: BatchSummary): number {
  if (summary.cancelled) return EXIT_CODES.CANCELLED;
  return summary.failed > 0 ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
}

function writeLogPointer(out: OutputStream): void {
  const logFile = logger.getLogFilePath();
  if (logFile) out.write(`Details: ${logFile}\n`);
}

export async function runCli(
  argv: readonly string[],
  overrides: Partial<CliDependencies> = {}
): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };

  try {
    const command = parseCommandLine(argv);
    if (command.help) {
      deps.stdout.write(HELP_TEXT);
      return EXIT_CODES.SUCCESS;
    }
    const { input } = command;

    const settings = deps.getSettings();
    const options = resolveOptions(input, settings, deps.defaultOutputDirectory());
    if (input.save) {
      const saved = settingsFromInput(input, options);
      deps.saveSettings(saved);
      logger.info("Defaults saved", saved);
    }

    const tools = deps.resolveTools(settings);
    const [ffmpeg, ffprobe] = await Promise.all([
      deps.verifyTool("ffmpeg", tools.ffmpegPath),
      deps.verifyTool("ffprobe", tools.ffprobePath),
    ]);
    logger.info("Tools verified", { ffmpeg, ffprobe });

    const orchestrator = new BatchOrchestrator(deps.createRunner(tools));
    const reporter = new ProgressReporter(deps.stdout, { interactive: deps.interactive });
    const detach = reporter.attach(orchestrator);
    const removeInterrupt = deps.onInterrupt(() => {
      deps.stderr.write("\nCancelling...\n");
      orchestrator.cancel();
    });

    let summary: BatchSummary;
    try {
      summary = await orchestrator.run(input.files, options);
    } finally {
      removeInterrupt();
      detach();
    }
    if (summary.failed > 0) writeLogPointer(deps.stderr);
    return exitCodeFor(summary);
  } catch (error) {
    if (AppError.isAppError(error)) {
      logger.error("CLI failed", error.toJSON());
    } else {
      logger.error("CLI failed", { error: getErrorMessage(error) });
    }
    deps.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    writeLogPointer(deps.stderr);
    return EXIT_CODES.FAILURE;
  }
}
