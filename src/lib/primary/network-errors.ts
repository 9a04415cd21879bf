// ---------------------------------------------------------------------------
// Network failure classification
// Maps whatever fetch threw (undici wraps the socket error in `cause`) onto a
// small set of kinds surfaced in `unreachable` outcomes.
// ---------------------------------------------------------------------------

import { SyncCancelledError } from "../errors";
import type { NetworkErrorKind } from "./types";

const CODE_KINDS = new Map<string, NetworkErrorKind>([
	["ECONNREFUSED", "refused"],
	["ENOTFOUND", "dns"],
	["EAI_AGAIN", "dns"],
	["ETIMEDOUT", "timeout"],
	["UND_ERR_CONNECT_TIMEOUT", "timeout"],
	["UND_ERR_HEADERS_TIMEOUT", "timeout"],
	["UND_ERR_BODY_TIMEOUT", "timeout"],
	["ECONNRESET", "socket"],
	["EPIPE", "socket"],
	["EHOSTUNREACH", "socket"],
	["ENETUNREACH", "socket"],
	["UND_ERR_SOCKET", "socket"],
	["UND_ERR_CLOSED", "socket"],
]);

function errorCode(err: unknown): string | undefined {
	if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
	return typeof err.code === "string" ? err.code : undefined;
}

export function classifyNetworkError(err: unknown): NetworkErrorKind {
	// Walk the cause chain: TypeError("fetch failed") → SocketError / system error
	let current: unknown = err;
	for (let depth = 0; depth < 5 && current !== undefined; depth++) {
		if (current instanceof SyncCancelledError) return "aborted";
		if (current instanceof Error) {
			if (current.name === "TimeoutError") return "timeout";
			if (current.name === "AbortError") return "aborted";
		}

		const kind = CODE_KINDS.get(errorCode(current) ?? "");
		if (kind) return kind;

		current = current instanceof Error ? current.cause : undefined;
	}

	if (err instanceof TypeError) return "socket";
	return "unknown";
}
