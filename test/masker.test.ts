import { describe, expect, it } from "vitest";
import {
	ALL_MASK,
	createMasker,
	MASK_STRING,
	MaskNotRegisteredError,
	MaskRegistry,
	parseQueryString,
	SensitivePaths,
} from "../src/index.js";

function enabledMasker() {
	return createMasker({ config: { enableSensitivePathsProcessor: true } });
}

describe("MaskRegistry", () => {
	it("should pre-register ALL without making it global", () => {
		const registry = new MaskRegistry();
		expect(registry.has(ALL_MASK)).toBe(true);
		expect(registry.globalNames()).toEqual(new Set());
	});

	it("should ignore unregister of an unknown name", () => {
		const registry = new MaskRegistry();
		expect(() => registry.unregister("N/A")).not.toThrow();
		expect(registry.names()).toEqual([ALL_MASK]);
	});

	it("should drop the global flag on unregister", () => {
		const registry = new MaskRegistry();
		registry.register("simple", new SensitivePaths("a"), { isGlobal: true });
		expect(registry.globalNames()).toEqual(new Set(["simple"]));

		registry.unregister("simple");
		expect(registry.has("simple")).toBe(false);
		expect(registry.globalNames()).toEqual(new Set());
	});

	it("should keep an earlier global flag when re-registered without it", () => {
		const registry = new MaskRegistry();
		registry.register("simple", new SensitivePaths("a"), { isGlobal: true });
		registry.register("simple", new SensitivePaths("b"));
		expect(registry.globalNames()).toEqual(new Set(["simple"]));
	});
});

describe("Masker", () => {
	describe("sanitizeData", () => {
		it("should mask everything with ALL and leave the input untouched", () => {
			const masker = enabledMasker();
			const data = {
				obj2: "shown",
				obj1: { key1: "secret", key2: "hidden" },
			};

			expect(masker.sanitizeData(data, ALL_MASK)).toEqual({
				[MASK_STRING]: MASK_STRING,
			});
			expect(data).toEqual({
				obj2: "shown",
				obj1: { key1: "secret", key2: "hidden" },
			});
		});

		it("should keep top-level keys with showNestedKeysInSensitivePaths", () => {
			const masker = createMasker({
				config: {
					enableSensitivePathsProcessor: true,
					showNestedKeysInSensitivePaths: true,
				},
			});
			expect(
				masker.sanitizeData({ obj2: "shown", list1: ["a", "b"] }, ALL_MASK),
			).toEqual({ obj2: MASK_STRING, list1: MASK_STRING });
		});

		it("should apply global rule sets without naming them", () => {
			const masker = enabledMasker();
			masker.register("simple", new SensitivePaths("obj1/key1", "list1"), {
				isGlobal: true,
			});

			expect(
				masker.sanitizeData({
					obj1: { key1: "secret", key2: "shown" },
					list1: ["a", "b"],
				}),
			).toEqual({
				obj1: { key1: MASK_STRING, key2: "shown" },
				list1: [MASK_STRING, MASK_STRING],
			});
		});

		it("should throw for an unregistered name", () => {
			const masker = enabledMasker();
			expect(() => masker.sanitizeData({ a: 1 }, "missing")).toThrow(
				MaskNotRegisteredError,
			);
			expect(() => masker.sanitizeData({ a: 1 }, "missing")).toThrow(
				'Mask processor "missing" is not registered',
			);
		});

		it("should return an equal copy while the processor is disabled", () => {
			const masker = createMasker();
			const data = { password: "pw" };
			const result = masker.sanitizeData(data, ALL_MASK);
			expect(result).toEqual({ password: "pw" });
			expect(result).not.toBe(data);
		});

		it("should share functions and class instances by reference", () => {
			const masker = enabledMasker();
			masker.register("secrets", new SensitivePaths("password"));
			const onDone = () => 1;
			const sentAt = new Date(0);
			const data = { password: "pw", onDone, nested: [{ sentAt }] };

			const result = masker.sanitizeData(data, "secrets");

			expect(result).toEqual({
				password: MASK_STRING,
				onDone,
				nested: [{ sentAt }],
			});
			expect(result.onDone).toBe(onDone);
			expect(result.nested[0]!.sentAt).toBe(sentAt);
			expect(result.nested).not.toBe(data.nested);
			expect(data.password).toBe("pw");
		});

		it("should copy values it cannot mask while the processor is disabled", () => {
			const callback = () => 1;
			const result = createMasker().sanitizeData({ callback }, ALL_MASK);
			expect(result).toEqual({ callback });
		});

		it("should pick up configure() changes", () => {
			const masker = createMasker();
			masker.configure({ enableSensitivePathsProcessor: true });
			expect(masker.sanitizeData({ a: 1 }, ALL_MASK)).toEqual({
				[MASK_STRING]: MASK_STRING,
			});
		});
	});

	describe("resolveNames", () => {
		it("should order explicit, scoped, then global names", () => {
			const masker = enabledMasker();
			masker.register("g", new SensitivePaths("g"), { isGlobal: true });
			masker.register("s", new SensitivePaths("s"));
			masker.register("e", new SensitivePaths("e"));

			const names = masker.withMasks("s", () => masker.resolveNames(["e"]));
			expect([...names]).toEqual(["e", "s", "g"]);
		});
	});

	describe("sanitizeQueryString", () => {
		it("should mask values of a form-encoded string", () => {
			const masker = enabledMasker();
			masker.register("form", new SensitivePaths("key1"));
			expect(
				masker.sanitizeQueryString("key1=value1&key2=value2", "form"),
			).toBe("key1=***+masked+***&key2=value2");
		});

		it("should keep every value of a repeated key", () => {
			const masker = enabledMasker();
			expect(masker.sanitizeQueryString("a=1&a=2&b=3")).toBe("a=1&a=2&b=3");
		});

		it("should mask every value of a repeated key", () => {
			const masker = enabledMasker();
			masker.register("a", new SensitivePaths("a"));
			expect(masker.sanitizeQueryString("a=1&a=2&b=3", "a")).toBe(
				"a=***+masked+***&a=***+masked+***&b=3",
			);
		});

		it("should produce text that parses back to the same keys", () => {
			const masker = enabledMasker();
			masker.register("form", new SensitivePaths("token", "a"));
			const text = "a=1&token=abc&a=2&user=ada";

			const masked = masker.sanitizeQueryString(text, "form");

			expect(Object.keys(parseQueryString(masked) ?? {})).toEqual(
				Object.keys(parseQueryString(text) ?? {}),
			);
			expect(parseQueryString(masked)).toEqual({
				a: [MASK_STRING, MASK_STRING],
				token: [MASK_STRING],
				user: ["ada"],
			});
		});

		it("should return text that is not a query string unchanged", () => {
			const masker = enabledMasker();
			expect(masker.sanitizeQueryString("not a query string", ALL_MASK)).toBe(
				"not a query string",
			);
		});

		it("should mask unparseable text with preferTextFallbackMasking", () => {
			const masker = createMasker({
				config: {
					enableSensitivePathsProcessor: true,
					preferTextFallbackMasking: true,
				},
			});
			expect(masker.sanitizeQueryString("not a query string")).toBe(
				MASK_STRING,
			);
		});
	});

	describe("sanitizeRequestData", () => {
		it("should send strings through the query-string rules", () => {
			const masker = enabledMasker();
			masker.register("form", new SensitivePaths("key1"));
			expect(masker.sanitizeRequestData("key1=value1", "form")).toBe(
				"key1=***+masked+***",
			);
		});

		it("should send objects through sanitizeData", () => {
			const masker = enabledMasker();
			masker.register("form", new SensitivePaths("key1"));
			expect(masker.sanitizeRequestData({ key1: "v", key2: "w" }, "form")).toEqual(
				{ key1: MASK_STRING, key2: "w" },
			);
		});

		it("should pass other values through", () => {
			const masker = enabledMasker();
			expect(masker.sanitizeRequestData([])).toEqual([]);
			expect(masker.sanitizeRequestData(42)).toBe(42);
			expect(masker.sanitizeRequestData(null)).toBeNull();
		});
	});

	describe("sanitizeUrl", () => {
		it("should mask only the query component", () => {
			const masker = enabledMasker();
			masker.register("token", new SensitivePaths("token"));
			expect(
				masker.sanitizeUrl(
					"https://api.example.com/v1/items?token=abc&page=2#top",
					"token",
				),
			).toBe("https://api.example.com/v1/items?token=***+masked+***&page=2#top");
		});

		it("should return URLs without a query unchanged", () => {
			const masker = enabledMasker();
			expect(masker.sanitizeUrl("/v1/items", ALL_MASK)).toBe("/v1/items");
			expect(masker.sanitizeUrl("/v1/items?", ALL_MASK)).toBe("/v1/items?");
		});

		it("should leave an unparseable query alone", () => {
			const masker = createMasker({
				config: {
					enableSensitivePathsProcessor: true,
					preferTextFallbackMasking: true,
				},
			});
			expect(masker.sanitizeUrl("/search?flag", ALL_MASK)).toBe("/search?flag");
		});
	});
});
