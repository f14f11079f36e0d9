import { describe, expect, it } from "vitest";
import { parseBsubOutput } from "./bsub.ts";

describe("parseBsubOutput", () => {
  it("reads the job ID and queue", () => {
    expect(
      parseBsubOutput("Job <482913> is submitted to queue <gpu2>."),
    ).toEqual({ jobId: "482913", queue: "gpu2" });
  });

  it("accepts the default-queue wording", () => {
    expect(
      parseBsubOutput("Job <77> is submitted to default queue <normal>."),
    ).toEqual({ jobId: "77", queue: "normal" });
  });

  it("finds the receipt after other output", () => {
    const output = [
      "Warning: job will be charged to project default",
      "Job <1024> is submitted to queue <gpu>.",
    ].join("\n");
    expect(parseBsubOutput(output)).toEqual({ jobId: "1024", queue: "gpu" });
  });

  it("returns null when no job was submitted", () => {
    expect(
      parseBsubOutput("gpu3: No such queue. Job not submitted."),
    ).toBeNull();
    expect(parseBsubOutput("")).toBeNull();
  });
});
