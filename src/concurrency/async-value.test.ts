import { describe, expect, test, vi } from "vitest";
import { AsyncValue, type Outcome } from "./async-value.js";
import { TimeoutError } from "./timeout.js";

describe("AsyncValue", () => {
	describe("deferred", () => {
		test("starts pending", () => {
			const { value } = AsyncValue.deferred<number>();

			expect(value.state).toBe("pending");
			expect(value.isCompleted).toBe(false);
			expect(value.result).toBeUndefined();
		});

		test("completes at most once", () => {
			const { value, completer } = AsyncValue.deferred<number>();

			expect(completer.succeed(1)).toBe(true);
			expect(completer.succeed(2)).toBe(false);
			expect(completer.fail(new Error("late"))).toBe(false);
			expect(value.result).toEqual({ success: true, data: 1 });
		});

		test("wraps non-error failures", () => {
			const { value, completer } = AsyncValue.deferred<number>();

			completer.fail("plain string");

			expect(value.state).toBe("failed");
			const outcome = value.result;
			expect(outcome?.success === false && outcome.error.message).toBe(
				"plain string",
			);
		});
	});

	describe("onComplete", () => {
		test("runs callbacks registered while pending, in order", () => {
			const { value, completer } = AsyncValue.deferred<string>();
			const seen: string[] = [];

			value.onComplete(() => seen.push("first"));
			value.onComplete(() => seen.push("second"));
			completer.succeed("done");

			expect(seen).toEqual(["first", "second"]);
		});

		test("runs callbacks registered after completion on a microtask", async () => {
			const value = AsyncValue.succeeded(5);
			const callback = vi.fn();

			value.onComplete(callback);
			expect(callback).not.toHaveBeenCalled();

			await Promise.resolve();
			expect(callback).toHaveBeenCalledTimes(1);
			expect(callback).toHaveBeenCalledWith({ success: true, data: 5 });
		});

		test("invokes each callback exactly once", async () => {
			const { value, completer } = AsyncValue.deferred<number>();
			const early = vi.fn();
			const late = vi.fn();

			value.onComplete(early);
			completer.succeed(1);
			completer.succeed(2);
			value.onComplete(late);
			await value.await();

			expect(early).toHaveBeenCalledTimes(1);
			expect(late).toHaveBeenCalledTimes(1);
		});

		test("allows registering on the same value from inside a callback", async () => {
			const { value, completer } = AsyncValue.deferred<number>();
			const outcomes: Outcome<number>[] = [];

			value.onComplete(() => {
				value.onComplete((outcome) => outcomes.push(outcome));
			});
			completer.succeed(9);
			await value.await();
			await Promise.resolve();

			expect(outcomes).toEqual([{ success: true, data: 9 }]);
		});
	});

	describe("run", () => {
		test("does not run the task synchronously", async () => {
			const task = vi.fn(() => 3);

			const value = AsyncValue.run(task);
			expect(task).not.toHaveBeenCalled();

			expect(await value.await()).toBe(3);
			expect(task).toHaveBeenCalledTimes(1);
		});

		test("adopts promise results", async () => {
			const value = AsyncValue.run(async () => "async");

			expect(await value.await()).toBe("async");
		});

		test("fails when the task throws", async () => {
			const value = AsyncValue.run(() => {
				throw new Error("task failed");
			});

			await expect(value.await()).rejects.toThrow("task failed");
			expect(value.state).toBe("failed");
		});

		test("fails when the task's promise rejects", async () => {
			const value = AsyncValue.run(() => Promise.reject(new Error("rejected")));

			await expect(value.await()).rejects.toThrow("rejected");
		});
	});

	describe("from", () => {
		test("returns async values unchanged", () => {
			const value = AsyncValue.succeeded(1);

			expect(AsyncValue.from(value)).toBe(value);
		});

		test("adopts promises and plain values", async () => {
			expect(await AsyncValue.from(Promise.resolve("p")).await()).toBe("p");
			expect(await AsyncValue.from("plain").await()).toBe("plain");
		});
	});

	describe("map and chain", () => {
		test("map transforms the success value", async () => {
			const doubled = AsyncValue.succeeded(21).map((n) => n * 2);

			expect(await doubled.await()).toBe(42);
		});

		test("map passes failures through without calling fn", async () => {
			const fn = vi.fn((n: number) => n);
			const mapped = AsyncValue.failed<number>(new Error("upstream")).map(fn);

			await expect(mapped.await()).rejects.toThrow("upstream");
			expect(fn).not.toHaveBeenCalled();
		});

		test("map fails when fn throws", async () => {
			const mapped = AsyncValue.succeeded(1).map(() => {
				throw new Error("mapping failed");
			});

			await expect(mapped.await()).rejects.toThrow("mapping failed");
		});

		test("chain adopts the next asynchronous step", async () => {
			const chained = AsyncValue.succeeded(2).chain((n) =>
				AsyncValue.run(() => n + 1),
			);

			expect(await chained.await()).toBe(3);
		});
	});

	describe("await", () => {
		test("resolves within the bound", async () => {
			expect(await AsyncValue.succeeded("ok").await(100)).toBe("ok");
		});

		test("fails with TimeoutError when the bound is exceeded", async () => {
			const { value } = AsyncValue.deferred<string>();

			await expect(value.await(10)).rejects.toBeInstanceOf(TimeoutError);
			await expect(value.await(10)).rejects.toThrow(
				"Value not available after 10ms",
			);
			expect(value.state).toBe("pending");
		});
	});
});
