import { waitFor } from "./wait-for";
import { TopologyError, TopologyErrorType } from "../errors";

describe("waitFor", () => {
  let sleep: jest.Mock;

  beforeEach(() => {
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  it("returns without sleeping when the condition already holds", async () => {
    const condition = jest.fn().mockResolvedValue(true);

    await waitFor(condition, { timeoutMs: 1000, pollIntervalMs: 50, description: "thing", sleep });

    expect(condition).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("polls at the configured interval until the condition holds", async () => {
    const condition = jest
      .fn()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);
    const log = jest.fn();

    await waitFor(condition, {
      timeoutMs: 60_000,
      pollIntervalMs: 15_000,
      description: "thing",
      log,
      sleep,
    });

    expect(condition).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[15_000], [15_000]]);
    expect(log).toHaveBeenCalledWith(expect.stringMatching(/^ {2}Waiting for thing\.\.\. \(\d+s elapsed\)$/));
  });

  it("evaluates the condition once even with a zero timeout", async () => {
    const condition = jest.fn().mockResolvedValue(false);
    const log = jest.fn();

    const error = await waitFor(condition, {
      timeoutMs: 0,
      pollIntervalMs: 10,
      description: "thing",
      log,
      sleep,
    }).catch((e: unknown) => e);

    expect(condition).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(TopologyError);
    expect(error).toMatchObject({
      type: TopologyErrorType.TIMEOUT,
      message: "Timeout waiting for thing after 0ms",
    });
    expect(log).toHaveBeenCalledWith("  [thing] TIMEOUT after 0s", "stderr");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("propagates errors thrown by the condition", async () => {
    const condition = jest.fn().mockRejectedValue(new Error("describe failed"));

    await expect(
      waitFor(condition, { timeoutMs: 1000, pollIntervalMs: 10, description: "thing", sleep }),
    ).rejects.toThrow("describe failed");
    expect(sleep).not.toHaveBeenCalled();
  });
});
