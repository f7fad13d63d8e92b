import { describe, expect, it } from "vitest";
import { ValidationError } from "../core/app-error";
import type { AppSettings } from "../config/types";
import {
  dedupe,
  parseCommandLine,
  parseSpeedSetting,
  resolveOptions,
  settingsFromInput,
} from "./args";

const SETTINGS: AppSettings = {
  outputDirectory: "",
  speed: "1.25x",
  profile: "balanced",
  normalizeAudio: true,
  overwrite: true,
  ffmpegPath: "",
  ffprobePath: "",
};

describe("parseCommandLine", () => {
  it("recognizes help", () => {
    expect(parseCommandLine(["--help"])).toEqual({ help: true });
    expect(parseCommandLine(["-h", "a.mov"])).toEqual({ help: true });
  });

  it("parses every option and de-duplicates files", () => {
    const command = parseCommandLine([
      "a.mov",
      "-s",
      "1.5x",
      "-p",
      "high",
      "-n",
      "--no-overwrite",
      "-o",
      "/out",
      "b.mov",
      "./a.mov",
      "--save",
    ]);

    expect(command).toEqual({
      help: false,
      input: {
        files: ["a.mov", "b.mov"],
        outputDirectory: "/out",
        speed: 1.5,
        profile: "high",
        normalize: true,
        overwrite: false,
        save: true,
      },
    });
  });

  it("accepts custom speeds with or without the x suffix", () => {
    for (const [raw, expected] of [
      ["3", 3],
      ["1.15x", 1.15],
      ["2X", 2],
      [".5", 0.5],
    ] as const) {
      const command = parseCommandLine(["-s", raw, "a.mov"]);
      expect(command.help ? null : command.input.speed).toBe(expected);
    }
  });

  it("rejects speeds outside the supported range", () => {
    expect(() => parseCommandLine(["-s", "200", "a.mov"])).toThrow(
      "Invalid arguments: speed: Speed must be at most 100x"
    );
    expect(() => parseCommandLine(["-s", "0.05", "a.mov"])).toThrow(
      "Invalid arguments: speed: Speed must be at least 0.1x"
    );
  });

  it("rejects malformed speeds and unknown profiles", () => {
    expect(() => parseCommandLine(["-s", "fast", "a.mov"])).toThrow(ValidationError);
    expect(() => parseCommandLine(["-p", "ultra", "a.mov"])).toThrow(ValidationError);
  });

  it("requires at least one file", () => {
    expect(() => parseCommandLine(["-n"])).toThrow(
      "Invalid arguments: files: Add at least one video file"
    );
  });

  it("turns unknown flags into validation errors", () => {
    expect(() => parseCommandLine(["--bogus", "a.mov"])).toThrow(ValidationError);
  });
});

describe("dedupe", () => {
  it("keeps the first spelling of each path", () => {
    expect(dedupe(["a.mov", "./a.mov", "b.mov", "a.mov"])).toEqual(["a.mov", "b.mov"]);
  });
});

describe("resolveOptions", () => {
  it("falls back to saved settings, then the home folder", () => {
    expect(resolveOptions({ files: ["a.mov"], save: false }, SETTINGS, "/home/test")).toEqual({
      speedFactor: 1.25,
      normalizeAudio: true,
      outputDirectory: "/home/test",
      profile: "balanced",
      overwrite: true,
    });
  });

  it("prefers command line values", () => {
    const options = resolveOptions(
      {
        files: ["a.mov"],
        outputDirectory: "/exports",
        speed: 2,
        profile: "high",
        normalize: false,
        overwrite: false,
        save: false,
      },
      { ...SETTINGS, outputDirectory: "/saved" },
      "/home/test"
    );
    expect(options).toEqual({
      speedFactor: 2,
      normalizeAudio: false,
      outputDirectory: "/exports",
      profile: "high",
      overwrite: false,
    });
  });

  it("uses the saved output folder when none is given", () => {
    const options = resolveOptions(
      { files: ["a.mov"], save: false },
      { ...SETTINGS, outputDirectory: "/saved" },
      "/home/test"
    );
    expect(options.outputDirectory).toBe("/saved");
  });
});

describe("saved settings", () => {
  it("falls back to normal speed for an unusable saved value", () => {
    expect(parseSpeedSetting("quick")).toBe(1);
    expect(parseSpeedSetting("0.75x")).toBe(0.75);
  });

  it("persists only what was given", () => {
    const input = { files: ["a.mov"], speed: 2, normalize: true, save: true };
    const options = resolveOptions(input, SETTINGS, "/home/test");
    expect(settingsFromInput(input, options)).toEqual({
      outputDirectory: undefined,
      speed: "2x",
      profile: undefined,
      normalizeAudio: true,
      overwrite: undefined,
    });
  });
});
