import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { execa } from "execa";
import { build } from "tsup";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { cliBuild } from "./tsup.config.ts";

const cliDir = fileURLToPath(new URL(".", import.meta.url));

const EXPECTED_SCRIPT = [
  "#!/bin/sh",
  '#BSUB -gpu "num=1:mode=exclusive_process"',
  "#BSUB -n 1",
  "#BSUB -q gpu2",
  "#BSUB -o run7.out",
  "#BSUB -e run7.err",
  "#BSUB -J run7",
  "bash examples/lora_single_gpu/sft.sh --epochs 3",
  "",
].join("\n");

// Stands in for bsub: keeps what it was fed, then answers like LSF does
const FAKE_BSUB = [
  "#!/bin/sh",
  "cat > received.sh",
  'if [ -n "$FAKE_BSUB_EXIT" ]; then',
  '  echo "Bad queue name. Job not submitted." >&2',
  '  exit "$FAKE_BSUB_EXIT"',
  "fi",
  'echo "Job <42> is submitted to queue <gpu2>."',
  "",
].join("\n");

let outDir: string;
let sandbox: string;
let jobDir: string;
let bin: string;

beforeAll(async () => {
  // Inside the package so the bundle resolves its dependencies as an install would
  outDir = mkdtempSync(join(cliDir, ".bin-test-"));
  await build({
    ...cliBuild,
    outDir,
    clean: false,
    silent: true,
    config: false,
  });
  bin = join(outDir, "index.js");

  sandbox = mkdtempSync(join(tmpdir(), "ftsub-bin-"));
  jobDir = join(sandbox, "job");
  mkdirSync(jobDir);
  mkdirSync(join(sandbox, "home"));
  mkdirSync(join(sandbox, "bin"));
  writeFileSync(join(sandbox, "bin", "bsub"), FAKE_BSUB, { mode: 0o755 });
}, 60_000);

afterAll(() => {
  rmSync(outDir, { recursive: true, force: true });
  rmSync(sandbox, { recursive: true, force: true });
});

function runCli(args: string[], env: Record<string, string> = {}) {
  return execa(process.execPath, [bin, ...args], {
    cwd: jobDir,
    reject: false,
    extendEnv: false,
    env: {
      PATH: `${join(sandbox, "bin")}:${process.env["PATH"] ?? ""}`,
      HOME: join(sandbox, "home"),
      ...env,
    },
  });
}

describe("built ftsub binary", () => {
  it("starts with a plain node shebang", () => {
    expect(readFileSync(bin, "utf-8").split("\n")[0]).toBe(
      "#!/usr/bin/env node",
    );
  });

  it("prints its version from a directory outside the repo", async () => {
    const result = await runCli(["--version"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("0.1.0");
  });

  it("renders the job file from a directory outside the repo", async () => {
    const result = await runCli([
      "render",
      "--name",
      "run7",
      "--",
      "--epochs",
      "3",
    ]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(EXPECTED_SCRIPT.trimEnd());
  });

  it("submits through bsub in the working directory", async () => {
    const result = await runCli(
      ["submit", "--name", "run7", "--json", "--", "--epochs", "3"],
      { GPU: "V100" },
    );

    expect(result.exitCode).toBe(0);
    const body: unknown = JSON.parse(result.stdout);
    expect(body).toMatchObject({
      jobName: "run7",
      preset: "llama-factory",
      jobId: "42",
      queue: "gpu2",
      exitCode: 0,
    });
    expect(readFileSync(join(jobDir, "received.sh"), "utf-8")).toBe(
      EXPECTED_SCRIPT.replace("#BSUB -q gpu2", "#BSUB -q gpu"),
    );
    expect(existsSync(join(jobDir, "run7.sh"))).toBe(false);
  });

  it("exits with bsub's status when the submission fails", async () => {
    const result = await runCli(["submit", "--name", "run7"], {
      FAKE_BSUB_EXIT: "3",
    });

    expect(result.exitCode).toBe(3);
    expect(result.stderr.split("\n")).toContain(
      "Error: bsub exited with code 3",
    );
    expect(existsSync(join(jobDir, "run7.sh"))).toBe(false);
  });
});
