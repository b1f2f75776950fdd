import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/**
 * Asks `dpkg` for the build host's architecture. Resolves to `undefined`
 * when `dpkg` is missing or fails, so callers can fall back.
 */
export async function probeHostArchitecture(): Promise<string | undefined> {
	try {
		const { stdout } = await execFileAsync("dpkg", ["--print-architecture"], {
			encoding: "utf8",
		});
		return stdout.trim() || undefined;
	} catch {
		return undefined;
	}
}
