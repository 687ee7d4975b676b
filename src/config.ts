import { z } from "zod";
import {
  GEOCODE_DELAY_MS,
  GEOCODE_TIMEOUT_MS,
  NOMINATIM_DEFAULT_URL,
  NOMINATIM_DEFAULT_USER_AGENT,
} from "./constants";
import { ConfigurationError } from "./errors";

const OFF_VALUES = ["0", "false", "off", "no"];

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ""
        ? fallback
        : !OFF_VALUES.includes(value.trim().toLowerCase())
    );

const envSchema = z.object({
  GEOCODER_ENABLED: flag(true),
  GEOCODER_DELAY_MS: z.coerce.number().int().nonnegative().default(GEOCODE_DELAY_MS),
  GEOCODER_TIMEOUT_MS: z.coerce.number().int().positive().default(GEOCODE_TIMEOUT_MS),
  NOMINATIM_BASE_URL: z.string().url().default(NOMINATIM_DEFAULT_URL),
  NOMINATIM_USER_AGENT: z.string().min(1).default(NOMINATIM_DEFAULT_USER_AGENT),
  DEBUG_GEO: flag(false),
});

export interface GeocoderConfig {
  enabled: boolean;
  delayMs: number;
  timeoutMs: number;
  baseUrl: string;
  userAgent: string;
  /** Enables GEO_CHAIN console tracing in the geocoder. */
  debug: boolean;
}

/**
 * Reads geocoder settings from the environment. Unset variables take the
 * defaults from constants.ts.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GeocoderConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    enabled: values.GEOCODER_ENABLED,
    delayMs: values.GEOCODER_DELAY_MS,
    timeoutMs: values.GEOCODER_TIMEOUT_MS,
    baseUrl: values.NOMINATIM_BASE_URL,
    userAgent: values.NOMINATIM_USER_AGENT,
    debug: values.DEBUG_GEO,
  };
}
