import { beforeEach, describe, expect, it, vi } from "vitest";
import {
	createLoggedFetch,
	createLogger,
	createMasker,
	type LogEntry,
	type Logger,
	MASK_STRING,
	type Masker,
	SensitivePaths,
} from "../src/index.js";

describe("createLoggedFetch", () => {
	let entries: LogEntry[];
	let logger: Logger;
	let masker: Masker;

	beforeEach(() => {
		entries = [];
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
		masker = createMasker({ config: { enableSensitivePathsProcessor: true } });
		masker.register("secrets", new SensitivePaths("password", "token"), {
			isGlobal: true,
		});
	});

	it("should log START and END around the call", async () => {
		const fetchFn = vi.fn(
			async () =>
				new Response('{"token":"t-1","ok":true}', {
					status: 200,
					headers: { "content-type": "application/json" },
				}),
		);
		const loggedFetch = createLoggedFetch({ logger, masker, fetchFn });

		const response = await loggedFetch("https://api.example.com/login", {
			method: "post",
			headers: { "X-Client": "test" },
			body: JSON.stringify({ user: "ada", password: "pw" }),
			notes: { attempt: 1 },
		});

		expect(await response.json()).toEqual({ token: "t-1", ok: true });
		expect(fetchFn).toHaveBeenCalledWith("https://api.example.com/login", {
			method: "post",
			headers: { "X-Client": "test" },
			body: '{"user":"ada","password":"pw"}',
		});
		expect(entries.map((e) => e.message)).toEqual([
			"OUTGOING (start): POST https://api.example.com/login",
			"OUTGOING (end): POST https://api.example.com/login (200)",
		]);
		expect(entries[1]!.meta.request).toEqual({
			method: "POST",
			url: "https://api.example.com/login",
			path: "/login",
			headers: { "x-client": "test" },
			data: { user: "ada", password: MASK_STRING },
		});
		expect(entries[1]!.meta.response).toEqual({
			status_code: 200,
			data: { token: MASK_STRING, ok: true },
		});
		expect(entries[1]!.meta.notes).toEqual({ attempt: 1 });
	});

	it("should read Request objects and URLSearchParams bodies", async () => {
		const fetchFn = vi.fn(async () => new Response("ok"));
		const loggedFetch = createLoggedFetch({ logger, masker, fetchFn });

		await loggedFetch(new Request("https://api.example.com/form?token=abc"), {
			method: "PUT",
			body: new URLSearchParams({ password: "pw", user: "ada" }),
		});

		expect(entries[1]!.message).toBe(
			"OUTGOING (end): PUT https://api.example.com/form?token=***+masked+*** (200)",
		);
		expect(entries[1]!.meta.request).toMatchObject({
			path: "/form?token=***+masked+***",
			data: "password=***+masked+***&user=ada",
		});
		expect(entries[1]!.meta.response).toEqual({ status_code: 200, data: "ok" });
	});

	it("should apply per-call mask names", async () => {
		masker.register("people", new SensitivePaths("user"));
		const loggedFetch = createLoggedFetch({
			logger,
			masker,
			fetchFn: async () => new Response("{}"),
		});

		await loggedFetch("https://api.example.com/users", {
			method: "POST",
			body: '{"user":"ada"}',
			maskNames: ["people"],
		});

		expect(entries[1]!.meta.request).toMatchObject({
			data: { user: MASK_STRING },
		});
	});

	it("should log the failure and re-throw it", async () => {
		const failure = new TypeError("fetch failed");
		const loggedFetch = createLoggedFetch({
			logger,
			masker,
			fetchFn: async () => {
				throw failure;
			},
		});

		await expect(loggedFetch("https://api.example.com/")).rejects.toBe(failure);

		expect(entries).toHaveLength(2);
		expect(entries[1]!.levelName).toBe("ERROR");
		expect(entries[1]!.message).toBe("OUTGOING (end): GET https://api.example.com/");
		expect(entries[1]!.meta.failure).toEqual({
			message: "fetch failed",
			name: "TypeError",
		});
	});

	it("should call straight through when outbound logging is disabled", async () => {
		masker.configure({ enableOutboundRequestLogging: false });
		const fetchFn = vi.fn(async () => new Response("ok"));
		const loggedFetch = createLoggedFetch({ logger, masker, fetchFn });

		await loggedFetch("https://api.example.com/", { notes: "ignored" });

		expect(fetchFn).toHaveBeenCalledWith("https://api.example.com/", {});
		expect(entries).toHaveLength(0);
	});
});
