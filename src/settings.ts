import { z } from "zod";
import { VersionPolicy } from "./const.js";
import { SettingsError } from "./exceptions.js";
import { type Logger, NULL_LOGGER } from "./support/utils.js";

function isLogger(value: unknown): value is Logger {
	return (
		typeof value === "object" &&
		value !== null &&
		"debug" in value &&
		typeof value.debug === "function"
	);
}

const unmarshalSettingsSchema = z.object({
	versionPolicy: z.nativeEnum(VersionPolicy).default(VersionPolicy.Strict),
	logger: z
		.custom<Logger>(isLogger, { message: "logger must have a debug method" })
		.default(NULL_LOGGER),
});

export type UnmarshalSettings = z.infer<typeof unmarshalSettingsSchema>;
export type UnmarshalOptions = Partial<z.input<typeof unmarshalSettingsSchema>>;

export { unmarshalSettingsSchema };

export function createUnmarshalSettings(
	input?: UnmarshalOptions,
): UnmarshalSettings {
	const result = unmarshalSettingsSchema.safeParse(input ?? {});
	if (!result.success) {
		throw new SettingsError(
			result.error.issues
				.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
				.join("; "),
		);
	}
	return result.data;
}
