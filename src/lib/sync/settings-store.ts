// ---------------------------------------------------------------------------
// Settings persistence port
// Device identity, endpoint and checkpoint are loaded once when the
// orchestrator opens and written back through this port.
// ---------------------------------------------------------------------------

import { v4 as uuidv4 } from "uuid";
import { readJsonFile, writeJsonAtomic } from "../utils/json-file";
import { SyncSettingsSchema } from "./schemas";
import type { SyncSettings } from "./types";

export interface SettingsStore {
	/** `null` on first run. */
	load(): Promise<SyncSettings | null>;
	/** @throws {StorageError} */
	save(settings: SyncSettings): Promise<void>;
}

/** JSON document written atomically on every save. */
export class FileSettingsStore implements SettingsStore {
	constructor(private readonly filePath: string) {}

	load(): Promise<SyncSettings | null> {
		return readJsonFile(this.filePath, SyncSettingsSchema);
	}

	save(settings: SyncSettings): Promise<void> {
		return writeJsonAtomic(this.filePath, settings);
	}
}

export class MemorySettingsStore implements SettingsStore {
	private current: SyncSettings | null;

	constructor(initial: SyncSettings | null = null) {
		this.current = initial ? { ...initial } : null;
	}

	/** Last saved settings (for assertions). */
	get value(): SyncSettings | null {
		return this.current ? { ...this.current } : null;
	}

	async load(): Promise<SyncSettings | null> {
		return this.value;
	}

	async save(settings: SyncSettings): Promise<void> {
		this.current = { ...settings };
	}
}

/** `<prefix>_<8 hex chars>`, e.g. `wearable_3f9a0c1e`. */
export function generateDeviceId(prefix: string): string {
	return `${prefix}_${uuidv4().replace(/-/g, "").slice(0, 8)}`;
}
