import { z } from "zod";

// =============================================================================
// RUN CONFIG
// =============================================================================

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const HintsSchema = z
  .object({
    memory_mb: z.number().int().positive().optional(),
    bandwidth_mbps: z.number().positive().optional(),
  })
  .strict();

const DirectorySchema = z
  .object({
    graph_base_url: z.string().url().default("https://graph.microsoft.com/v1.0"),
    token_env: z.string().min(1).default("HOLDSWEEP_GRAPH_TOKEN"),
    page_size: z.number().int().min(1).max(999).default(999),
    timeout_ms: z.number().int().positive().default(30000),
  })
  .strict();

const StatusServiceSchema = z
  .object({
    pwsh_path: z.string().min(1).default("pwsh"),
    // Per-call deadline for Get-Mailbox/Set-Mailbox invocations.
    timeout_ms: z.number().int().positive().default(60000),
    connect_command: z.string().min(1).optional(),
  })
  .strict();

export const SweepConfigSchema = z
  .object({
    output_dir: z.string().min(1).default("reports"),
    preview: z.boolean().default(false),

    batch_size: z.number().int().positive().optional(),
    concurrency: z.number().int().positive().optional(),

    max_errors: z.number().int().nonnegative().default(50),
    continue_on_errors: z.boolean().default(false),

    filter: z.string().min(1).optional(),
    license_filter: z.string().min(1).optional(),
    license_table: z.string().min(1).optional(),

    log_level: z.enum(LOG_LEVELS).default("info"),

    hints: HintsSchema.default({}),
    directory: DirectorySchema.default({}),
    status_service: StatusServiceSchema.default({}),
  })
  .strict();

export type SweepConfig = z.infer<typeof SweepConfigSchema>;
export type DirectoryConfig = z.infer<typeof DirectorySchema>;
export type StatusServiceConfig = z.infer<typeof StatusServiceSchema>;

export function defaultSweepConfig(): SweepConfig {
  return SweepConfigSchema.parse({});
}

// =============================================================================
// LICENSE TABLE DOCUMENT
// =============================================================================

const LicenseEntrySchema = z
  .object({
    display_name: z.string().min(1),
    litigation_hold_supported: z.boolean(),
  })
  .strict();

export const LicenseTableDocumentSchema = z
  .object({
    version: z.literal(1).default(1),
    categories: z
      .record(z.string().min(1), z.record(z.string().min(1), LicenseEntrySchema))
      .refine((categories) => Object.keys(categories).length > 0, {
        message: "at least one license category is required",
      }),
  })
  .strict();

export type LicenseTableDocument = z.infer<typeof LicenseTableDocumentSchema>;
