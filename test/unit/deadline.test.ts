import { describe, it, expect } from "vitest";
import { createDeadline, raceAbort } from "../../src/utils/deadline.js";
import { TimeoutError } from "../../src/utils/errors.js";
import { deferred } from "../helpers/fake_backends.js";

describe("createDeadline", () => {
  it("should abort with a TimeoutError once the time is up", async () => {
    const deadline = createDeadline(5);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(TimeoutError);
    expect(deadline.signal.reason.message).toBe("Request deadline of 5ms exceeded");
    deadline.dispose();
  });

  it("should follow the parent signal", () => {
    const parent = new AbortController();
    const deadline = createDeadline(10_000, parent.signal);

    parent.abort();

    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  it("should not fire after dispose", async () => {
    const deadline = createDeadline(5);
    deadline.dispose();
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(deadline.signal.aborted).toBe(false);
  });
});

describe("raceAbort", () => {
  it("should pass through the promise outcome", async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve("ok"), controller.signal)).resolves.toBe("ok");
    await expect(raceAbort(Promise.reject(new Error("no")), controller.signal)).rejects.toThrow("no");
  });

  it("should reject on abort without waiting for the promise", async () => {
    const deadline = createDeadline(10_000);
    const gate = deferred();
    const pending = raceAbort(gate.promise, deadline.signal);

    deadline.dispose();
    const controller = new AbortController();
    const aborted = raceAbort(gate.promise, controller.signal);
    controller.abort();

    await expect(aborted).rejects.toBeInstanceOf(TimeoutError);
    gate.release();
    await expect(pending).resolves.toBeUndefined();
  });

  it("should reject at once when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(raceAbort(new Promise(() => undefined), controller.signal)).rejects.toBeInstanceOf(TimeoutError);
  });
});
