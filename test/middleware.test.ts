import { beforeEach, describe, expect, it } from "vitest";
import {
	createLogger,
	createMasker,
	edgeEndFilterMiddleware,
	endEdgeOnly,
	type LogEntry,
	MASK_STRING,
	maskingMiddleware,
	passesEdgeEndFilter,
	SensitivePaths,
	type Transformer,
} from "../src/index.js";

function entryWith(meta: Record<string, unknown>): LogEntry {
	return {
		id: "abc",
		level: 30,
		levelName: "INFO",
		message: "test",
		timestamp: 0,
		meta,
	};
}

describe("Middleware", () => {
	let entries: LogEntry[];
	let testTransport: Transformer;

	beforeEach(() => {
		entries = [];
		testTransport = {
			name: "test",
			transform(entry: LogEntry) {
				entries.push(entry);
			},
		};
	});

	describe("passesEdgeEndFilter", () => {
		it("should pass plain entries", () => {
			expect(passesEdgeEndFilter(entryWith({ edge: "START" }))).toBe(true);
		});

		it("should drop exchange records on START", () => {
			expect(passesEdgeEndFilter(entryWith({ smart: true, edge: "START" }))).toBe(
				false,
			);
		});

		it("should pass exchange records on END", () => {
			expect(passesEdgeEndFilter(entryWith({ smart: true, edge: "END" }))).toBe(
				true,
			);
		});
	});

	describe("edgeEndFilterMiddleware", () => {
		it("should keep START records away from every transformer", () => {
			const logger = createLogger({
				transports: [testTransport],
				middleware: [edgeEndFilterMiddleware()],
			});

			logger.info("plain");
			logger.info("start", { smart: true, edge: "START" });
			logger.info("end", { smart: true, edge: "END" });

			expect(entries.map((e) => e.message)).toEqual(["plain", "end"]);
		});
	});

	describe("endEdgeOnly", () => {
		it("should filter one transformer and keep its name", () => {
			const all: string[] = [];
			const logger = createLogger({
				transports: [
					endEdgeOnly(testTransport),
					{ name: "all", transform: (e) => void all.push(e.message) },
				],
			});

			logger.info("start", { smart: true, edge: "START" });
			logger.info("end", { smart: true, edge: "END" });

			expect(entries.map((e) => e.message)).toEqual(["end"]);
			expect(all).toEqual(["start", "end"]);

			logger.removeTransport("test");
			logger.info("after");
			expect(entries).toHaveLength(1);
		});
	});

	describe("maskingMiddleware", () => {
		const masker = createMasker({
			config: { enableSensitivePathsProcessor: true },
		});
		masker.register("credentials", new SensitivePaths("credentials/password"));
		masker.register("session", new SensitivePaths("sessionId"));

		it("should mask meta and context of plain entries", () => {
			const logger = createLogger({
				transports: [testTransport],
				middleware: [
					maskingMiddleware({ masker, names: ["credentials", "session"] }),
				],
			});
			const meta = { credentials: { user: "ada", password: "pw" } };

			logger.child({ sessionId: "s-1" }).info("login", meta);

			expect(entries[0]!.meta).toEqual({
				credentials: { user: "ada", password: MASK_STRING },
			});
			expect(entries[0]!.context).toEqual({ sessionId: MASK_STRING });
			expect(meta.credentials.password).toBe("pw");
		});

		it("should pass callbacks in meta through to transformers", () => {
			const logger = createLogger({
				transports: [testTransport],
				middleware: [maskingMiddleware({ masker, names: ["credentials"] })],
			});
			const cb = () => 1;

			logger.info("hi", { cb, credentials: { password: "pw" } });

			expect(entries).toHaveLength(1);
			expect(entries[0]!.meta).toEqual({
				cb,
				credentials: { password: MASK_STRING },
			});
		});

		it("should leave exchange records alone by default", () => {
			const logger = createLogger({
				transports: [testTransport],
				middleware: [maskingMiddleware({ masker, names: ["session"] })],
			});

			logger.info("exchange", { smart: true, sessionId: "s-1" });

			expect(entries[0]!.meta).toEqual({ smart: true, sessionId: "s-1" });
		});

		it("should mask exchange records with includeExchanges", () => {
			const logger = createLogger({
				transports: [testTransport],
				middleware: [
					maskingMiddleware({ masker, names: ["session"], includeExchanges: true }),
				],
			});

			logger.info("exchange", { smart: true, sessionId: "s-1" });

			expect(entries[0]!.meta).toEqual({ smart: true, sessionId: MASK_STRING });
		});
	});
});
