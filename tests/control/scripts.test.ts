import { describe, expect, it } from "vitest";
import { renderConffiles, renderPostinst } from "../../src/control";

// Lines between "configure)" and the branch terminator.
function configureBranch(script: string): string[] {
	const lines = script.split("\n");
	const start = lines.indexOf("    configure)");
	const end = lines.indexOf("    ;;", start);
	return lines.slice(start + 1, end);
}

describe("renderPostinst", () => {
	it("puts each command in the configure branch, in order", () => {
		const script = renderPostinst([
			"chown -R svc:svc /opt/app",
			"systemctl daemon-reload",
		]);

		expect(configureBranch(script)).toEqual([
			"        chown -R svc:svc /opt/app",
			"        systemctl daemon-reload",
		]);
	});

	it("renders the fixed skeleton", () => {
		expect(renderPostinst(["chown -R svc:svc /opt/app"])).toBe(
			[
				"#!/bin/sh",
				"# postinst script generated by debwrap.",
				"set -e",
				'case "$1" in',
				"    configure)",
				"        chown -R svc:svc /opt/app",
				"    ;;",
				"",
				"    abort-upgrade|abort-remove|abort-deconfigure)",
				"    ;;",
				"",
				"    *)",
				`        echo "postinst called with unknown argument '$1'" >&2`,
				"        exit 1",
				"    ;;",
				"esac",
				"",
				"exit 0",
				"",
			].join("\n"),
		);
	});

	it("leaves the configure branch empty without commands", () => {
		expect(configureBranch(renderPostinst([]))).toEqual([]);
	});
});

describe("renderConffiles", () => {
	it("sorts paths, one per line", () => {
		expect(renderConffiles(["/etc/sub/other.conf", "/etc/app.conf"])).toBe(
			"/etc/app.conf\n/etc/sub/other.conf\n",
		);
	});

	it("renders nothing for no conffiles", () => {
		expect(renderConffiles([])).toBe("");
	});
});
