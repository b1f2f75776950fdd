import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_FILE_MODE } from "../archive/constants";
import {
	type ArchitectureProbe,
	buildControlRecord,
	type ControlRecord,
	renderConffiles,
	renderControl,
	renderPostinst,
	resolveArchitectures,
} from "../control";
import type { PackageDescription } from "../package";
import type { BuildContext } from "./context";
import { probeHostArchitecture } from "./host";

/** Maintainer scripts must be executable (rwxr-xr-x). */
const SCRIPT_MODE = 0o755;

export interface MetadataOptions {
	/** Host architecture probe for packages without an explicit architecture. */
	probe?: ArchitectureProbe;
	/** Write a binary package control file. Defaults to `true`. */
	binary?: boolean;
}

export interface WrittenMetadata {
	architectures: string[];
	control: ControlRecord;
	conffiles: string[];
}

async function writeControlFile(
	context: BuildContext,
	filename: string,
	content: string,
	mode: number = DEFAULT_FILE_MODE,
): Promise<void> {
	const target = context.staging.controlPath(filename);
	await fs.writeFile(target, content);
	await fs.chmod(target, mode);
}

// Lists regular files below `dir` as paths relative to it, in traversal order.
async function listFiles(dir: string, prefix = ""): Promise<string[]> {
	const dirents = await fs.readdir(dir, { withFileTypes: true });
	const files: string[] = [];

	for (const dirent of dirents) {
		const relative = prefix ? `${prefix}/${dirent.name}` : dirent.name;

		if (dirent.isDirectory()) {
			files.push(...(await listFiles(path.join(dir, dirent.name), relative)));
		} else if (dirent.isFile()) {
			files.push(relative);
		}
	}

	return files;
}

/**
 * Every regular file staged below `/etc`, as sorted install paths. A package
 * without `/etc` has no conffiles.
 */
export async function collectConffiles(context: BuildContext): Promise<string[]> {
	const etc = await context.staging.dataDirPath("/etc", { create: false });

	try {
		const stat = await fs.stat(etc);
		if (!stat.isDirectory()) return [];
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			return [];
		}
		throw err;
	}

	return (await listFiles(etc)).map((file) => `/etc/${file}`).sort();
}

/**
 * Creates the symbolic links recorded by rules. Each link lives in the data
 * tree and its target is the install path, so it resolves on the installed
 * system.
 */
export async function createSymlinks(context: BuildContext): Promise<void> {
	for (const { source, link } of context.symlinks) {
		const staged = await context.staging.dataPath(link);
		context.logger.info({ source, link }, `${source} <- ${link}`);
		await fs.symlink(source, staged);
	}
}

/**
 * Writes every piece of package metadata once all rules have run: the
 * `control` file, the `postinst` script, the copyright file, `conffiles`,
 * and finally the deferred symbolic links.
 */
export async function writeMetadata(
	pkg: PackageDescription,
	context: BuildContext,
	options: MetadataOptions = {},
): Promise<WrittenMetadata> {
	const binary = options.binary ?? true;

	const architectures = await resolveArchitectures(pkg.architecture, {
		probe: options.probe ?? probeHostArchitecture,
		source: !binary,
	});
	context.logger.debug({ architectures }, "Resolved architectures");

	const control = buildControlRecord(pkg, architectures, { binary });
	await writeControlFile(context, "control", renderControl(control));
	await writeControlFile(
		context,
		"postinst",
		renderPostinst(context.postinstCommands),
		SCRIPT_MODE,
	);

	const copyright = await context.staging.dataPath(
		`/usr/share/doc/${pkg.name}/copyright`,
	);
	await fs.writeFile(copyright, pkg.copyright);
	await fs.chmod(copyright, DEFAULT_FILE_MODE);

	const conffiles = await collectConffiles(context);
	await writeControlFile(context, "conffiles", renderConffiles(conffiles));

	await createSymlinks(context);

	return { architectures, control, conffiles };
}
