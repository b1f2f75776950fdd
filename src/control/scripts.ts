/**
 * Renders the `postinst` maintainer script. Each command runs, in order, when
 * `dpkg` configures the package; any unknown action fails the script.
 */
export function renderPostinst(commands: readonly string[]): string {
	const lines = [
		"#!/bin/sh",
		"# postinst script generated by debwrap.",
		"set -e",
		'case "$1" in',
		"    configure)",
		...commands.map((command) => `        ${command}`),
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
	];

	return `${lines.join("\n")}\n`;
}

/**
 * Renders the `conffiles` list: one absolute path per line, sorted so the
 * output does not depend on directory traversal order.
 */
export function renderConffiles(paths: readonly string[]): string {
	if (paths.length === 0) return "";
	return `${[...paths].sort().join("\n")}\n`;
}
