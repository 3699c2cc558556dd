import { assert, describe, test } from "@trellis-ui/testkit";
import { type Diagnostic, createDiagnosticRecorder } from "../diagnostics.js";

function info(detail: string): Diagnostic {
  return { code: "TRL_STALE_RESUME", severity: "info", subsystem: "suspense", detail };
}

describe("createDiagnosticRecorder", () => {
  test("records only between begin() and take()", () => {
    const forwarded: string[] = [];
    const recorder = createDiagnosticRecorder((d) => forwarded.push(d.detail));

    recorder.sink(info("before"));
    recorder.begin();
    recorder.sink(info("during"));
    const taken = recorder.take();
    recorder.sink(info("after"));

    assert.deepEqual(
      taken.map((d) => d.detail),
      ["during"],
    );
    assert.deepEqual(forwarded, ["before", "during", "after"]);
    assert.deepEqual(recorder.take(), []);
  });

  test("begin() starts a fresh record", () => {
    const recorder = createDiagnosticRecorder(() => {});
    recorder.begin();
    recorder.sink(info("first"));
    recorder.begin();
    recorder.sink(info("second"));
    assert.deepEqual(
      recorder.take().map((d) => d.detail),
      ["second"],
    );
  });
});
