// ---------------------------------------------------------------------------
// Contract Tests: Companion Server API
// Request and response shapes of /api/v1/health and /api/v1/data
// ---------------------------------------------------------------------------

import { PrimaryTransport } from "@/lib/primary/client";
import { HealthResponseSchema, SyncRequestSchema, SyncResponseSchema } from "@/lib/primary/schemas";
import { createRecord } from "@/lib/records/record";
import { describe, expect, it } from "vitest";
import { createMockFetch } from "../helpers/mock-fetch";

const ok = {
	status: 200,
	body: { success: true, message: "Data synced", last_sync_timestamp: 1_700_000_000_000, synced_count: 1 },
};

function transportWith(fetchFn: ReturnType<typeof createMockFetch>) {
	return new PrimaryTransport({ baseUrl: "http://companion.test:3000", fetchFn, maxRetries: 0, rateLimit: 100 });
}

describe("Companion Server API Contract", () => {
	describe("POST /api/v1/data", () => {
		it("sends a body matching the sync request schema", async () => {
			const fetchFn = createMockFetch([ok]);
			const record = createRecord({ id: "r1", timestamp: 10, kind: "daily_metrics", payload: { steps: 8000 } });

			await transportWith(fetchFn).submit([record], "wearable_0a1b2c3d", 5);

			const body: unknown = JSON.parse(String(fetchFn.mock.calls[0][1]?.body));
			expect(SyncRequestSchema.safeParse(body).success).toBe(true);
		});

		it("sends JSON with matching content headers", async () => {
			const fetchFn = createMockFetch([ok]);

			await transportWith(fetchFn).submit([], "wearable_0a1b2c3d", 0);

			expect(fetchFn.mock.calls[0][1]?.headers).toEqual({
				"Content-Type": "application/json",
				Accept: "application/json",
			});
		});

		it("accepts a response with the documented fields", () => {
			expect(SyncResponseSchema.safeParse(ok.body).success).toBe(true);
		});

		it("rejects a response missing synced_count", () => {
			const { synced_count: _omitted, ...partial } = ok.body;
			expect(SyncResponseSchema.safeParse(partial).success).toBe(false);
		});

		it("rejects unknown record types in returned data", () => {
			const result = SyncResponseSchema.safeParse({
				...ok.body,
				data: [{ id: "x", timestamp: 1, type: "blood_oxygen", data: {}, source: "Wearable", synced: false }],
			});
			expect(result.success).toBe(false);
		});
	});

	describe("GET /api/v1/health", () => {
		it("accepts the documented health body", () => {
			expect(
				HealthResponseSchema.safeParse({ status: "healthy", server_time: 1_700_000_000_000, version: "1.0.0" })
					.success,
			).toBe(true);
		});

		it("rejects a health body without server_time", () => {
			expect(HealthResponseSchema.safeParse({ status: "healthy", version: "1.0.0" }).success).toBe(false);
		});
	});

	describe("GET /api/v1/data", () => {
		it("encodes device id and checkpoint as query parameters", async () => {
			const fetchFn = createMockFetch([ok]);

			await transportWith(fetchFn).fetchSince("wearable_0a1b2c3d", 1_700_000_000_000);

			const url = new URL(String(fetchFn.mock.calls[0][0]));
			expect(url.pathname).toBe("/api/v1/data");
			expect(url.searchParams.get("device_id")).toBe("wearable_0a1b2c3d");
			expect(url.searchParams.get("since")).toBe("1700000000000");
			expect(fetchFn.mock.calls[0][1]?.method).toBe("GET");
		});
	});
});
