import { describe, expect, it } from "vitest";
import type { SubmissionResult } from "@ftsub/shared";
import { describeSubmission } from "./submit.ts";

function result(overrides: Partial<SubmissionResult> = {}): SubmissionResult {
  return {
    jobId: "482913",
    queue: "gpu",
    exitCode: 0,
    stdout: "Job <482913> is submitted to queue <gpu>.",
    stderr: "",
    scriptPath: "/work/run7.sh",
    ...overrides,
  };
}

describe("describeSubmission", () => {
  it("reports a confirmed submission with exit code 0", () => {
    expect(describeSubmission(result(), "run7")).toEqual({
      status: "submitted",
      message: "Submitted run7 as job 482913 to queue gpu",
      exitCode: 0,
    });
  });

  it("passes bsub's failure status through", () => {
    const outcome = describeSubmission(
      result({ jobId: null, queue: null, exitCode: 255, stdout: "" }),
      "run7",
    );

    expect(outcome).toEqual({
      status: "failed",
      message: "Error: bsub exited with code 255",
      exitCode: 255,
    });
  });

  it("treats a failure as failed even when a receipt was printed", () => {
    expect(describeSubmission(result({ exitCode: 3 }), "run7").exitCode).toBe(
      3,
    );
  });

  it("warns without failing when bsub prints no job ID", () => {
    expect(
      describeSubmission(result({ jobId: null, queue: null }), "run7"),
    ).toEqual({
      status: "unconfirmed",
      message: "bsub did not report a job ID for run7",
      exitCode: 0,
    });
  });
});
