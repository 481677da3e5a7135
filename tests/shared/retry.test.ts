import { describe, it, expect, vi } from "vitest";
import { retry } from "../../src/shared/retry.js";

const always = () => true;

describe("retry", () => {
  it("retries until the call succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("ETIMEDOUT"))
      .mockResolvedValueOnce("done");

    await expect(retry(fn, { attempts: 3, delayMs: 0, isTransient: always })).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows errors the policy does not treat as transient", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("bad request"));
    const isTransient = vi.fn(() => false);

    await expect(retry(fn, { attempts: 3, delayMs: 0, isTransient })).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(isTransient).toHaveBeenCalledTimes(1);
  });

  it("gives up after the last attempt with the last error", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(retry(fn, { attempts: 2, delayMs: 0, isTransient: always })).rejects.toThrow("second");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
