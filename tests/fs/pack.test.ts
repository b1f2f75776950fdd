import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Readable } from "node:stream";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decoder, unpackAr, unpackTar } from "../../src/archive";
import { packTree, writeAr, writeTarGz } from "../../src/fs/pack";
import { exists, makeTempDir } from "../fixtures";

const mtime = new Date(1700000000000);

async function collect(stream: Readable): Promise<Uint8Array> {
	const chunks: Uint8Array[] = [];
	for await (const chunk of stream) {
		chunks.push(chunk);
	}
	return Buffer.concat(chunks);
}

describe("pack", () => {
	let tmpDir: string;
	let root: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir();
		root = path.join(tmpDir, "tree");

		await fs.mkdir(path.join(root, "usr", "bin"), { recursive: true });
		await fs.writeFile(path.join(root, "usr", "bin", "tool"), "#!/bin/sh\n");
		await fs.chmod(path.join(root, "usr", "bin", "tool"), 0o755);
		await fs.mkdir(path.join(root, "etc"));
		await fs.writeFile(path.join(root, "etc", "tool.conf"), "a=1\n");
		await fs.chmod(path.join(root, "etc", "tool.conf"), 0o644);
		await fs.symlink("/usr/bin/tool", path.join(root, "usr", "bin", "alias"));
		for (const dir of ["", "usr", "usr/bin", "etc"]) {
			await fs.chmod(path.join(root, dir), 0o755);
		}
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	describe("packTree", () => {
		it("names entries from ./ in sorted order", async () => {
			const entries = unpackTar(await collect(packTree(root, { mtime })));

			expect(entries.map((e) => e.header.name)).toEqual([
				"./",
				"./etc/",
				"./etc/tool.conf",
				"./usr/",
				"./usr/bin/",
				"./usr/bin/alias",
				"./usr/bin/tool",
			]);
		});

		it("records root ownership, modes and the fixed timestamp", async () => {
			const entries = unpackTar(await collect(packTree(root, { mtime })));

			for (const entry of entries) {
				expect(entry.header.uid).toBe(0);
				expect(entry.header.gid).toBe(0);
				expect(entry.header.uname).toBe("root");
				expect(entry.header.gname).toBe("root");
				expect(entry.header.mtime).toEqual(mtime);
			}

			const tool = entries.find((e) => e.header.name === "./usr/bin/tool");
			expect(tool?.header.mode).toBe(0o755);
			expect(tool?.header.type).toBe("file");
			expect(decoder.decode(tool?.data)).toBe("#!/bin/sh\n");

			const dir = entries.find((e) => e.header.name === "./etc/");
			expect(dir?.header.type).toBe("directory");
			expect(dir?.header.mode).toBe(0o755);
		});

		it("stores symlinks with their target", async () => {
			const entries = unpackTar(await collect(packTree(root, { mtime })));
			const alias = entries.find((e) => e.header.name === "./usr/bin/alias");

			expect(alias?.header.type).toBe("symlink");
			expect(alias?.header.linkname).toBe("/usr/bin/tool");
			expect(alias?.header.size).toBe(0);
		});

		it("produces the same bytes for the same tree", async () => {
			const first = await collect(packTree(root, { mtime }));
			const second = await collect(packTree(root, { mtime }));

			expect(Buffer.compare(first, second)).toBe(0);
		});
	});

	it("writes a gzip-compressed tarball", async () => {
		const destination = path.join(tmpDir, "data.tar.gz");
		await writeTarGz(root, destination, { mtime });

		const entries = unpackTar(gunzipSync(await fs.readFile(destination)));
		expect(entries).toHaveLength(7);
	});

	describe("writeAr", () => {
		it("writes members in the order given", async () => {
			const one = path.join(tmpDir, "one");
			const two = path.join(tmpDir, "two");
			await fs.writeFile(one, "2.0\n");
			await fs.writeFile(two, "odd");
			const destination = path.join(tmpDir, "out.ar");

			await writeAr(
				destination,
				[
					{ name: "one", path: one },
					{ name: "two", path: two },
				],
				{ mtime },
			);

			const members = unpackAr(await fs.readFile(destination));
			expect(members.map((m) => m.header.name)).toEqual(["one", "two"]);
			expect(members.map((m) => decoder.decode(m.data))).toEqual([
				"2.0\n",
				"odd",
			]);
			expect(members[0].header.mtime).toEqual(mtime);
			expect(members[0].header.mode).toBe(0o100644);
		});

		it("removes a partial archive when a member is missing", async () => {
			const destination = path.join(tmpDir, "out.ar");

			await expect(
				writeAr(destination, [{ name: "gone", path: path.join(tmpDir, "gone") }]),
			).rejects.toThrow(/ENOENT/);
			expect(await exists(destination)).toBe(false);
		});
	});
});
