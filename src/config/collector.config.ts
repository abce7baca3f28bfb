/**
 * Collector Environment Configuration
 *
 * Validated once at startup by ConfigModule. Only the Datamanager address is
 * mandatory here; the INFLUX_DB_* variables are resolved per cycle by
 * InfluxService so that a missing sink setting costs one cycle, not the
 * process.
 */
import { z } from 'zod';

export const CollectorEnvSchema = z
  .object({
    FRONIUS_IP: z
      .string({ required_error: 'FRONIUS_IP is required' })
      .ip({ version: 'v4', message: 'FRONIUS_IP must be an IPv4 address' }),
    FRONIUS_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    FRONIUS_INVERTER_ID: z.coerce.number().int().default(1),
    FRONIUS_METER_ID: z.coerce.number().int().default(0),
    FRONIUS_STORAGE_ID: z.coerce.number().int().default(0),
    FRONIUS_OHM_PILOT_ID: z.coerce.number().int().default(0),
    COLLECTION_INTERVAL_SECONDS: z.coerce.number().positive().default(15),
    INFLUX_DB_URL: z.string().optional(),
    INFLUX_DB_ORG: z.string().optional(),
    INFLUX_DB_TOKEN: z.string().optional(),
    INFLUX_DB_BUCKET: z.string().optional(),
  })
  .passthrough();

export type CollectorEnv = z.infer<typeof CollectorEnvSchema>;

export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * `validate` hook for ConfigModule.forRoot.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function validateCollectorEnv(
  config: Record<string, unknown>,
): CollectorEnv {
  const result = CollectorEnvSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
