export { ConversionRunner, createDefaultRunnerDependencies, computePercent, nodeFileSystem } from "./conversion-runner";
export { buildConversionArgs, buildOutputPath } from "./ffmpeg-args-builder";
export type { ConversionHandle, JobRunner, RunnerDependencies, RunnerFileSystem } from "./types";
