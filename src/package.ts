import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { Rule } from "./fs/rules";

/**
 * Which architectures a package is built for, decided when the description
 * is constructed: an explicit list, or whatever the build host reports.
 */
export type Architecture =
	| { kind: "explicit"; values: readonly string[] }
	| { kind: "host" };

// Debian field values cannot contain newlines; names and versions cannot contain whitespace.
const token = z
	.string()
	.trim()
	.min(1, "must not be empty")
	.regex(/^\S+$/, "must not contain whitespace");

const singleLine = z
	.string()
	.trim()
	.min(1, "must not be empty")
	.regex(/^[^\n]*$/, "must be a single line");

const ruleSchema = z.custom<Rule>(
	(value) =>
		typeof value === "object" &&
		value !== null &&
		"apply" in value &&
		typeof value.apply === "function",
	{ message: "must be a rule with an apply() method" },
);

const architectureSchema = z
	.union([token, z.array(token).min(1, "must list at least one architecture")])
	.optional()
	.transform((value): Architecture => {
		if (value === undefined) return { kind: "host" };
		return {
			kind: "explicit",
			values: typeof value === "string" ? [value] : value,
		};
	});

export const packageSchema = z.object({
	name: token,
	version: token,
	architecture: architectureSchema,
	maintainer: z.object({
		name: singleLine,
		email: z.string().email(),
	}),
	description: singleLine,
	longDescription: z.string().trim().min(1, "must not be empty"),
	homepage: z.string().url().optional(),
	section: token.optional(),
	priority: token.optional(),
	depends: z.array(singleLine).default([]),
	conflicts: z.array(singleLine).default([]),
	copyright: z.string(),
	rules: z.array(ruleSchema).default([]),
});

/** Package description as written by a caller, before validation. */
export type PackageInput = z.input<typeof packageSchema>;

/**
 * A validated, immutable package description.
 */
export type PackageDescription = Readonly<
	Omit<z.output<typeof packageSchema>, "depends" | "conflicts" | "rules">
> & {
	readonly depends: readonly string[];
	readonly conflicts: readonly string[];
	readonly rules: readonly Rule[];
};

/**
 * Validates a package description. Throws {@link ConfigurationError} on the
 * first invalid field, before anything touches the filesystem.
 *
 * @example
 * ```typescript
 * const pkg = definePackage({
 *   name: "hello",
 *   version: "1.0.0",
 *   architecture: "amd64",
 *   maintainer: { name: "Jane Doe", email: "jane@example.com" },
 *   description: "Say hello",
 *   longDescription: "Prints a friendly greeting",
 *   copyright: "Copyright 2024 Jane Doe",
 *   rules: [placeFile("./build/hello", "/usr/bin/hello", { mode: 0o755 })],
 * });
 * ```
 */
export function definePackage(input: PackageInput): PackageDescription {
	const result = packageSchema.safeParse(input);

	if (!result.success) {
		const [issue] = result.error.issues;
		throw new ConfigurationError(
			issue.path.length > 0 ? issue.path.join(".") : "package",
			issue.message,
		);
	}

	const pkg = result.data;
	return Object.freeze({
		...pkg,
		depends: Object.freeze([...pkg.depends]),
		conflicts: Object.freeze([...pkg.conflicts]),
		rules: Object.freeze([...pkg.rules]),
	});
}
