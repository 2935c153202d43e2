import os from "os";
import path from "path";
import { PassThrough, Readable } from "stream";
import type { RenderLaunchSpec } from "../src/core/entities/RenderJob.js";
import { OrchestratorError } from "../src/core/errors/OrchestratorError.js";
import {
  buildRendererArgs,
  buildRendererEnv,
  mergeLines,
  resolveRendererExecutable,
} from "../src/infrastructure/process/RendererLauncher.js";
import { flush } from "./helpers/fakes.js";

const location = {
  binary: "~/tools/renderer",
  wellKnownPath: "/Applications/Renderer.app/Contents/MacOS/Renderer",
  searchName: "renderer",
};

function launchSpec(overrides: Partial<RenderLaunchSpec["options"]> = {}): RenderLaunchSpec {
  return {
    inputPath: "/work/ws-1/model.stl",
    outputPath: "/work/ws-1/turntable_base.webm",
    durationSeconds: 10,
    baseFps: 11,
    options: {
      axis: "Y",
      offset: 90,
      autoOrientation: false,
      quality: "ultra",
      format: "webm",
      resolution: 1440,
      watermark: true,
      kelvin: 6500,
      autoBrightness: false,
      exposure: -0.5,
      ...overrides,
    },
  };
}

describe("RendererLauncher", () => {
  describe("Executable resolution", () => {
    const pathEnv = ["/usr/local/bin", "/usr/bin"].join(path.delimiter);

    test("should prefer the configured path, expanding ~", () => {
      const configured = path.join(os.homedir(), "tools/renderer");
      const probe = (candidate: string) => candidate === configured || candidate === location.wellKnownPath;
      expect(resolveRendererExecutable(location, pathEnv, probe)).toBe(configured);
    });

    test("should fall back to the well-known install path", () => {
      const probe = (candidate: string) => candidate === location.wellKnownPath;
      expect(resolveRendererExecutable(location, pathEnv, probe)).toBe(location.wellKnownPath);
    });

    test("should search PATH last", () => {
      const probe = (candidate: string) => candidate === "/usr/bin/renderer";
      expect(resolveRendererExecutable(location, pathEnv, probe)).toBe("/usr/bin/renderer");
    });

    test("should fail with EXECUTABLE_NOT_FOUND", () => {
      let caught: unknown;
      try {
        resolveRendererExecutable(location, pathEnv, () => false);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(OrchestratorError);
      expect(caught instanceof OrchestratorError && caught.code).toBe("EXECUTABLE_NOT_FOUND");
    });
  });

  describe("Arguments", () => {
    test("should build the manual-orientation command line", () => {
      expect(buildRendererArgs(launchSpec(), "/opt/scripts/turntable")).toEqual([
        "-b", "-P", "/opt/scripts/turntable", "--",
        "--input", "/work/ws-1/model.stl",
        "--out", "/work/ws-1/turntable_base.webm",
        "--seconds", "10",
        "--fps", "11",
        "--size", "1440",
        "--axis", "Y",
        "--format", "webm",
        "--offset", "90",
        "--quality", "ultra",
        "--watermark",
        "--kelvin", "6500",
        "--exposure", "-0.5",
      ]);
    });

    test("should pass auto flags and omit exposure", () => {
      const args = buildRendererArgs(
        launchSpec({ autoOrientation: true, autoBrightness: true, watermark: false, exposure: 0 })
      );

      expect(args).toEqual([
        "--input", "/work/ws-1/model.stl",
        "--out", "/work/ws-1/turntable_base.webm",
        "--seconds", "10",
        "--fps", "11",
        "--size", "1440",
        "--axis", "Y",
        "--format", "webm",
        "--offset", "90",
        "--auto",
        "--quality", "ultra",
        "--kelvin", "6500",
        "--auto_brightness",
      ]);
    });
  });

  describe("Environment", () => {
    test("should prepend helper paths to an existing value", () => {
      const env = buildRendererEnv({ PATH: "/usr/bin", RENDERER_PATH: "/existing" }, ["/opt/a", "/opt/b"], "RENDERER_PATH");
      expect(env.RENDERER_PATH).toBe(["/opt/a", "/opt/b", "/existing"].join(path.delimiter));
      expect(env.PATH).toBe("/usr/bin");
    });

    test("should set the variable when it was unset", () => {
      const env = buildRendererEnv({}, ["/opt/a"], "RENDERER_PATH");
      expect(env.RENDERER_PATH).toBe("/opt/a");
    });

    test("should copy the environment untouched without helpers", () => {
      const base = { RENDERER_PATH: "/existing" };
      const env = buildRendererEnv(base, [], "RENDERER_PATH");
      expect(env).toEqual(base);
      expect(env).not.toBe(base);
    });
  });

  describe("Output merging", () => {
    function collect(stream: Readable): Promise<string> {
      return new Promise((resolve, reject) => {
        let text = "";
        stream.on("data", (chunk: Buffer | string) => {
          text += chunk.toString();
        });
        stream.once("end", () => resolve(text));
        stream.once("error", reject);
      });
    }

    test("should not splice a partial line with the other pipe's output", async () => {
      const stdout = new PassThrough();
      const stderr = new PassThrough();
      const merged = collect(mergeLines([stdout, stderr]));

      stdout.write("Fra:");
      await flush();
      stderr.write("Warning: slow shader\n");
      await flush();
      stdout.write("7 Mem:1M\n");
      await flush();
      stdout.end();
      stderr.end();

      expect(await merged).toBe("Warning: slow shader\nFra:7 Mem:1M\n");
    });

    test("should flush an unterminated last line and end after every pipe ends", async () => {
      const stdout = new PassThrough();
      const stderr = new PassThrough();
      const merged = collect(mergeLines([stdout, stderr]));

      stdout.end("Saved turntable");
      await flush();
      stderr.end("Done\r\n");

      expect(await merged).toBe("Saved turntable\nDone\n");
    });
  });
});
