import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { pino } from "pino";
import { definePackage, type PackageDescription, type PackageInput } from "../src/package";

/** Logger that drops everything. */
export const silentLogger = pino({ level: "silent" });

/** A minimal valid package input. */
export const basePackage: PackageInput = {
	name: "hello",
	version: "1.0.0",
	architecture: "amd64",
	maintainer: { name: "Jane Doe", email: "jane@example.com" },
	description: "A tool",
	longDescription: "Does things",
	copyright: "Copyright 2024 Jane Doe\n",
};

export function samplePackage(
	overrides: Partial<PackageInput> = {},
): PackageDescription {
	return definePackage({ ...basePackage, ...overrides });
}

/** Creates an empty directory under the OS temp dir. */
export function makeTempDir(): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), "debwrap-test-"));
}

/** Permission bits of a path, without following a final symlink. */
export async function modeOf(target: string): Promise<number> {
	return (await fs.lstat(target)).mode & 0o777;
}

export async function exists(target: string): Promise<boolean> {
	try {
		await fs.lstat(target);
		return true;
	} catch {
		return false;
	}
}
