import { beforeEach, describe, expect, it } from "vitest";
import {
	createLogger,
	createMasker,
	type LogEntry,
	type Logger,
	logOutgoingEvent,
	type Masker,
	openExchange,
	trackIncoming,
	trackOutgoing,
} from "../src/index.js";

describe("Exchange scopes", () => {
	let entries: LogEntry[];
	let logger: Logger;
	let masker: Masker;
	let clock: number;

	const now = () => new Date(2024, 0, 15, 10, 30, 0, clock++ * 100);

	beforeEach(() => {
		entries = [];
		clock = 0;
		logger = createLogger({
			transports: [
				{
					name: "test",
					transform(entry: LogEntry) {
						entries.push(entry);
					},
				},
			],
		});
		masker = createMasker();
	});

	it("should log START and END with the same exchange id", async () => {
		const result = await trackOutgoing(
			{
				logger,
				masker,
				method: "GET",
				url: "https://api.example.com/items",
				idGenerator: () => "ex-1",
				now,
			},
			async (exchange) => {
				exchange.request = {
					method: "GET",
					url: "https://api.example.com/items",
					headers: {},
				};
				exchange.response = { status: 200, text: "[]" };
				return "done";
			},
		);

		expect(result).toBe("done");
		expect(entries.map((e) => e.message)).toEqual([
			"OUTGOING (start): GET https://api.example.com/items",
			"OUTGOING (end): GET https://api.example.com/items (200)",
		]);
		expect(entries.map((e) => e.meta.exchangeId)).toEqual(["ex-1", "ex-1"]);
		expect(entries.map((e) => e.meta.edge)).toEqual(["START", "END"]);
		expect(entries[1]!.meta.response_time_ms).toBe(100);
		expect(entries[1]!.meta.response).toEqual({ status_code: 200, data: [] });
	});

	it("should bind the configured logger name as context", async () => {
		masker.configure({ loggerName: "billing-http" });

		await trackIncoming({ logger, masker, method: "GET", url: "/" }, () => 1);

		expect(entries.map((e) => e.context)).toEqual([
			{ logger: "billing-http" },
			{ logger: "billing-http" },
		]);
	});

	it("should log the failure on END and re-throw it unchanged", async () => {
		const failure = new Error("connection reset");

		await expect(
			trackOutgoing(
				{ logger, masker, method: "POST", url: "https://api.example.com/" },
				() => {
					throw failure;
				},
			),
		).rejects.toBe(failure);

		expect(entries).toHaveLength(2);
		expect(entries[1]!.levelName).toBe("ERROR");
		expect(entries[1]!.error?.message).toBe("connection reset");
		expect(entries[1]!.meta.failure).toEqual({
			message: "connection reset",
			name: "Error",
		});
	});

	it("should wrap non-Error failures", async () => {
		await expect(
			trackIncoming({ logger, masker, method: "GET", url: "/" }, () =>
				Promise.reject("nope"),
			),
		).rejects.toBe("nope");

		expect(entries[1]!.error?.message).toBe("nope");
	});

	it("should log END only once", () => {
		const exchange = openExchange(logOutgoingEvent, {
			logger,
			masker,
			method: "GET",
			url: "https://api.example.com/",
		});

		expect(exchange.finished).toBe(false);
		exchange.finish();
		exchange.finish(new Error("late"));

		expect(exchange.finished).toBe(true);
		expect(entries).toHaveLength(2);
		expect(entries[1]!.levelName).toBe("INFO");
	});

	it("should generate distinct ids by default", () => {
		const first = openExchange(logOutgoingEvent, { logger, masker, url: "/a" });
		const second = openExchange(logOutgoingEvent, { logger, masker, url: "/b" });

		expect(first.exchangeId).toMatch(/^[a-z0-9]+$/);
		expect(first.exchangeId).not.toBe(second.exchangeId);
	});
});
