import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BuildError, LintError } from "../../src/errors";
import { buildPackage } from "../../src/fs/build";
import { inspectDeb } from "../../src/fs/inspect";
import { makeSymlink, type Rule, writeFile } from "../../src/fs/rules";
import { exists, makeTempDir, samplePackage, silentLogger } from "../fixtures";

const mtime = new Date(1700000000000);

function buildError(err: unknown): BuildError {
	if (err instanceof BuildError) return err;
	throw err;
}

describe("buildPackage", () => {
	let tmpDir: string;
	let scratch: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir();
		scratch = path.join(tmpDir, "scratch");
		await fs.mkdir(scratch);
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	const options = () => ({ logger: silentLogger, tmpDir: scratch, mtime });
	const configured = () =>
		samplePackage({ rules: [writeFile("/etc/hello.conf", "greeting=hi\n")] });

	it("builds a package with the expected layout", async () => {
		const destination = path.join(tmpDir, "hello_1.0.0_amd64.deb");
		const result = await buildPackage(configured(), destination, options());

		expect(result.path).toBe(destination);
		expect(result.architectures).toEqual(["amd64"]);
		expect(result.conffiles).toEqual(["/etc/hello.conf"]);
		expect(result.stagingPath).toBeUndefined();
		expect(result.lint).toBeUndefined();

		const deb = await inspectDeb(destination);
		expect(deb.debianBinary).toBe("2.0\n");
		expect(deb.control.get("Package")).toBe("hello");
		expect(deb.control.get("Description")).toBe("A tool.\n Does things.");

		expect(deb.controlEntries.map((e) => e.header.name)).toEqual([
			"./",
			"./conffiles",
			"./control",
			"./postinst",
		]);
		expect(deb.dataEntries.map((e) => e.header.name)).toEqual([
			"./",
			"./etc/",
			"./etc/hello.conf",
			"./usr/",
			"./usr/share/",
			"./usr/share/doc/",
			"./usr/share/doc/hello/",
			"./usr/share/doc/hello/copyright",
		]);
	});

	it("marks the postinst as executable in the archive", async () => {
		const destination = path.join(tmpDir, "hello.deb");
		await buildPackage(configured(), destination, options());

		const { controlEntries } = await inspectDeb(destination);
		const postinst = controlEntries.find((e) => e.header.name === "./postinst");
		expect(postinst?.header.mode).toBe(0o755);
	});

	it("packs symlinks created by rules", async () => {
		const destination = path.join(tmpDir, "hello.deb");
		await buildPackage(
			samplePackage({
				rules: [
					writeFile("/opt/hello/bin/hello", "#!/bin/sh\n", { mode: 0o755 }),
					makeSymlink("/opt/hello/bin/hello", "/usr/bin/hello"),
				],
			}),
			destination,
			options(),
		);

		const { dataEntries } = await inspectDeb(destination);
		const link = dataEntries.find((e) => e.header.name === "./usr/bin/hello");
		expect(link?.header.type).toBe("symlink");
		expect(link?.header.linkname).toBe("/opt/hello/bin/hello");
	});

	it("keeps multi-byte file names whole", async () => {
		const installPath = `/opt/${"é".repeat(60)}`;
		const destination = path.join(tmpDir, "hello.deb");
		await buildPackage(
			samplePackage({ rules: [writeFile(installPath, "data\n")] }),
			destination,
			options(),
		);

		const { dataEntries } = await inspectDeb(destination);
		const entry = dataEntries.find((e) => e.header.name === `.${installPath}`);
		expect(entry?.header.size).toBe(5);
	});

	it("produces identical packages for identical inputs", async () => {
		const first = path.join(tmpDir, "first.deb");
		const second = path.join(tmpDir, "second.deb");

		await buildPackage(configured(), first, options());
		await buildPackage(configured(), second, options());

		expect(
			Buffer.compare(await fs.readFile(first), await fs.readFile(second)),
		).toBe(0);
	});

	it("replaces an existing package", async () => {
		const destination = path.join(tmpDir, "hello.deb");
		await fs.writeFile(destination, "stale");

		await buildPackage(configured(), destination, options());

		expect((await inspectDeb(destination)).control.get("Version")).toBe("1.0.0");
	});

	it("removes the scratch directory after a successful build", async () => {
		await buildPackage(configured(), path.join(tmpDir, "hello.deb"), options());

		expect(await fs.readdir(scratch)).toEqual([]);
	});

	it("keeps the scratch directory on request", async () => {
		const result = await buildPackage(
			configured(),
			path.join(tmpDir, "hello.deb"),
			{ ...options(), keepStaging: true },
		);

		expect(result.stagingPath).toBeDefined();
		expect(path.dirname(result.stagingPath ?? "")).toBe(scratch);
		expect(
			await exists(path.join(result.stagingPath ?? "", "data/etc/hello.conf")),
		).toBe(true);
	});

	it("wraps a failing rule and keeps the scratch directory", async () => {
		const destination = path.join(tmpDir, "hello.deb");
		await fs.writeFile(destination, "stale");
		const failing: Rule = {
			kind: "failing",
			async apply() {
				throw new Error("no space left");
			},
		};

		const err = buildError(
			await buildPackage(
				samplePackage({ rules: [failing] }),
				destination,
				options(),
			).catch((e: unknown) => e),
		);

		expect(err.message).toBe("Failed to build hello: no space left");
		expect(err.cause).toBeInstanceOf(Error);
		expect(err.stagingPath).toBeDefined();
		expect(await exists(err.stagingPath ?? "")).toBe(true);
		expect(await exists(destination)).toBe(false);
	});

	describe("linting", () => {
		async function fakeLinter(exitCode: number, output: string): Promise<string> {
			const script = path.join(tmpDir, "fake-lint");
			await fs.writeFile(
				script,
				`#!/bin/sh\nprintf '%s\\n' '${output}'\nexit ${exitCode}\n`,
			);
			await fs.chmod(script, 0o755);
			return script;
		}

		it("reports a linter that is not installed", async () => {
			const result = await buildPackage(
				configured(),
				path.join(tmpDir, "hello.deb"),
				{ ...options(), lint: { command: "debwrap-no-such-linter" } },
			);

			expect(result.lint).toEqual({
				status: "unavailable",
				command: "debwrap-no-such-linter",
			});
		});

		it("reports a clean run", async () => {
			const command = await fakeLinter(0, "N: all good");
			const result = await buildPackage(
				configured(),
				path.join(tmpDir, "hello.deb"),
				{ ...options(), lint: { command, args: [] } },
			);

			expect(result.lint).toEqual({ status: "passed", output: "N: all good\n" });
		});

		it("reports defects without failing by default", async () => {
			const command = await fakeLinter(2, "E: hello: some-tag");
			const destination = path.join(tmpDir, "hello.deb");
			const result = await buildPackage(configured(), destination, {
				...options(),
				lint: { command, args: [] },
			});

			expect(result.lint).toEqual({
				status: "failed",
				exitCode: 2,
				output: "E: hello: some-tag\n",
			});
			expect(await exists(destination)).toBe(true);
		});

		it("fails the build on defects when strict", async () => {
			const command = await fakeLinter(2, "E: hello: some-tag");
			const destination = path.join(tmpDir, "hello.deb");

			const err = buildError(
				await buildPackage(configured(), destination, {
					...options(),
					lint: { command, args: [], strict: true },
				}).catch((e: unknown) => e),
			);

			expect(err.cause).toBeInstanceOf(LintError);
			expect(err.cause).toMatchObject({
				exitCode: 2,
				output: "E: hello: some-tag\n",
			});
			expect(await exists(destination)).toBe(false);
		});
	});
});
