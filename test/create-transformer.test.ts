import { describe, expect, it, vi } from "vitest";
import {
	createLogger,
	createMasker,
	createTransformer,
	endEdgeOnly,
	type LogEntry,
	trackOutgoing,
} from "../src/index.js";

describe("createTransformer", () => {
	const masker = createMasker();

	it("should carry name, level and lifecycle hooks", () => {
		const transform = vi.fn();
		const flush = vi.fn();

		const transformer = createTransformer("failures", transform, {
			level: "ERROR",
			flush,
		});

		expect(transformer).toEqual({
			name: "failures",
			level: "ERROR",
			flush,
			transform,
		});
	});

	it("should receive only failed END records behind endEdgeOnly", async () => {
		const failures: LogEntry[] = [];
		const logger = createLogger({
			transports: [
				endEdgeOnly(
					createTransformer("failures", (e) => void failures.push(e), {
						level: "ERROR",
					}),
				),
			],
		});
		const options = {
			logger,
			masker,
			method: "GET",
			url: "https://api.example.com/items",
		};

		await trackOutgoing(options, () => "ok");
		await expect(
			trackOutgoing(options, () => {
				throw new Error("timeout");
			}),
		).rejects.toThrow("timeout");

		expect(failures.map((e) => [e.levelName, e.meta.edge, e.message])).toEqual([
			["ERROR", "END", "OUTGOING (end): GET https://api.example.com/items"],
		]);
	});

	it("should keep lifecycle hooks through endEdgeOnly", async () => {
		const flush = vi.fn();
		const close = vi.fn();
		const logger = createLogger({
			transports: [
				endEdgeOnly(createTransformer("sink", () => {}, { flush, close })),
			],
		});

		await logger.close();

		expect(flush).toHaveBeenCalledTimes(1);
		expect(close).toHaveBeenCalledTimes(1);
	});
});
