import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

export const FAILURE_LOG_FILE = "tool_failures.jsonl";

export interface HostEvent {
	type?: unknown;
	properties?: unknown;
}

export function failureLogPath(directory: string, hostDir: string): string {
	return join(directory, hostDir, "hooks", "logs", FAILURE_LOG_FILE);
}

/** Appends one JSON line per failure event; I/O errors are dropped. */
export async function appendFailureLog(
	directory: string,
	hostDir: string,
	event: HostEvent,
	now: Date = new Date(),
): Promise<void> {
	const filePath = failureLogPath(directory, hostDir);
	const line = JSON.stringify({
		timestamp: now.toISOString(),
		type: typeof event.type === "string" && event.type !== "" ? event.type : "unknown",
		properties: event.properties ?? null,
	});

	try {
		await mkdir(join(directory, hostDir, "hooks", "logs"), { recursive: true });
		await appendFile(filePath, `${line}\n`, "utf-8");
	} catch {
		return;
	}
}
