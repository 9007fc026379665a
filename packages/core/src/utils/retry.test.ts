import * as t from "vitest";
import { ErrorCode, HarnessError } from "../domain/errors";
import { retry } from "./retry";

t.describe("retry", () => {
	t.it("should return the result on the first attempt if it succeeds", async () => {
		const successfulFn = t.vi.fn().mockResolvedValue("success");
		const options = { attempts: 3, delay: 100 };

		const result = await retry(successfulFn, options);

		t.expect(result).toBe("success");
		t.expect(successfulFn).toHaveBeenCalledTimes(1);
	});

	t.it("should retry the function and succeed on the second attempt", async () => {
		const failingThenSuccessfulFn = t.vi.fn().mockRejectedValueOnce(new Error("First failure")).mockResolvedValueOnce("success");

		const result = await retry(failingThenSuccessfulFn, { attempts: 3, delay: 10 });

		t.expect(result).toBe("success");
		t.expect(failingThenSuccessfulFn).toHaveBeenCalledTimes(2);
	});

	t.it("should throw the last error after exhausting all attempts", async () => {
		const lastError = new Error("Final failure");
		const alwaysFailingFn = t.vi.fn().mockRejectedValueOnce(new Error("Fail 1")).mockRejectedValueOnce(new Error("Fail 2")).mockRejectedValue(lastError);

		await t.expect(retry(alwaysFailingFn, { attempts: 3, delay: 10 })).rejects.toThrow(lastError);
		t.expect(alwaysFailingFn).toHaveBeenCalledTimes(3);
	});

	t.it("should keep retrying without an attempt limit", async () => {
		const fn = t.vi.fn();
		for (let i = 0; i < 6; i++) fn.mockRejectedValueOnce(new Error(`Fail ${i}`));
		fn.mockResolvedValueOnce("finally");

		const result = await retry(fn, { delay: 1, maxDelay: 2 });

		t.expect(result).toBe("finally");
		t.expect(fn).toHaveBeenCalledTimes(7);
	});

	t.it("should not retry errors rejected by shouldRetry", async () => {
		const fatal = new Error("fatal");
		const fn = t.vi.fn().mockRejectedValue(fatal);

		await t.expect(retry(fn, { delay: 1, shouldRetry: () => false })).rejects.toBe(fatal);
		t.expect(fn).toHaveBeenCalledTimes(1);
	});

	t.it("should report each retry with a capped exponential backoff", async () => {
		const fn = t.vi.fn().mockRejectedValueOnce(new Error("1")).mockRejectedValueOnce(new Error("2")).mockRejectedValueOnce(new Error("3")).mockResolvedValueOnce("ok");
		const onRetry = t.vi.fn();

		await retry(fn, { delay: 2, maxDelay: 5, onRetry });

		t.expect(onRetry.mock.calls.map(([, attempt, backoff]) => [attempt, backoff])).toEqual([
			[1, 2],
			[2, 4],
			[3, 5],
		]);
	});

	t.it("should stop with an abort error once the signal is raised", async () => {
		const controller = new AbortController();
		const fn = t.vi.fn().mockImplementation(async () => {
			controller.abort();
			throw new Error("unreachable broker");
		});

		const error = await retry(fn, { delay: 10_000, signal: controller.signal }).catch((e: unknown) => e);

		t.expect(error).toBeInstanceOf(HarnessError);
		t.expect((error as HarnessError).code).toBe(ErrorCode.ABORTED);
		t.expect(fn).toHaveBeenCalledTimes(1);
	});

	t.it("should throw an unexpected error if attempts is 0", async () => {
		const fn = t.vi.fn();

		await t.expect(retry(fn, { attempts: 0, delay: 100 })).rejects.toThrow("Retry logic failed unexpectedly.");
		t.expect(fn).not.toHaveBeenCalled();
	});

	t.it("should use exponential backoff for delays", async () => {
		const alwaysFailingFn = t.vi.fn().mockRejectedValueOnce(new Error("Fail 1")).mockRejectedValueOnce(new Error("Fail 2")).mockRejectedValue(new Error("Final failure"));
		const startTime = Date.now();

		await t.expect(retry(alwaysFailingFn, { attempts: 3, delay: 10 })).rejects.toThrow("Final failure");

		// 10ms + 20ms of backoff, with some tolerance for timer precision
		t.expect(Date.now() - startTime).toBeGreaterThanOrEqual(25);
		t.expect(alwaysFailingFn).toHaveBeenCalledTimes(3);
	});
});
