import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BuildContext } from "../../src/fs/context";
import { makeTempDir, modeOf, silentLogger } from "../fixtures";

describe("BuildContext", () => {
	let tmpDir: string;
	let context: BuildContext;

	beforeEach(async () => {
		tmpDir = await makeTempDir();
		context = await BuildContext.create({ tmpDir, logger: silentLogger });
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("starts empty", () => {
		expect(context.postinstCommands).toEqual([]);
		expect(context.symlinks).toEqual([]);
		expect(context.logger).toBe(silentLogger);
	});

	it("queues a recursive chown for an owned directory", async () => {
		const staged = await context.makeDirectory("/var/lib/app/", {
			owner: "svc",
			group: "svc",
		});

		expect(staged).toBe(path.join(context.staging.dataRoot, "var/lib/app"));
		expect((await fs.stat(staged)).isDirectory()).toBe(true);
		expect(context.postinstCommands).toEqual(["chown -R svc:svc /var/lib/app"]);
	});

	it("chowns to the owner alone without a group", async () => {
		await context.makeDirectory("/srv/data", { owner: "svc" });

		expect(context.postinstCommands).toEqual(["chown -R svc /srv/data"]);
	});

	it("ignores a group without an owner", async () => {
		await context.makeDirectory("/srv/data", { group: "svc", mode: 0o700 });

		expect(context.postinstCommands).toEqual([]);
		expect(await modeOf(path.join(context.staging.dataRoot, "srv/data"))).toBe(
			0o700,
		);
	});

	it("records normalized symlinks in order", () => {
		context.addSymlink("opt//app/bin/app", "usr/bin/app/");
		context.addSymlink("/opt/app/lib", "/usr/lib/app");

		expect(context.symlinks).toEqual([
			{ source: "/opt/app/bin/app", link: "/usr/bin/app" },
			{ source: "/opt/app/lib", link: "/usr/lib/app" },
		]);
	});
});
