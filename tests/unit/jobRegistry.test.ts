import { JobRegistry, UnknownJobTypeError } from "../../src/application/job-manager/JobRegistry";
import { TestJob } from "../helpers/jobs";

describe("JobRegistry", () => {
  it("rebuilds a job from its id and payload", () => {
    const registry = new JobRegistry().register(
      "test",
      ({ id, payload }) => new TestJob({ id, label: typeof payload.label === "string" ? payload.label : "" })
    );

    const job = registry.create("test", { id: "restored", payload: { label: "nightly" } });

    expect(registry.has("test")).toBe(true);
    expect(job.getId()).toBe("restored");
    expect(job.serialize()).toEqual({ label: "nightly" });
  });

  it("rejects a second factory for the same type", () => {
    const registry = new JobRegistry().register("test", ({ id }) => new TestJob({ id }));
    expect(() => registry.register("test", ({ id }) => new TestJob({ id }))).toThrow(
      "Job type already registered: test"
    );
  });

  it("throws UnknownJobTypeError for unregistered types", () => {
    const registry = new JobRegistry();
    expect(() => registry.create("missing", { id: "x", payload: {} })).toThrow(UnknownJobTypeError);
    expect(() => registry.create("missing", { id: "x", payload: {} })).toThrow(
      'No job factory registered for type "missing"'
    );
  });
});
