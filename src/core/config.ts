import { z, type ZodIssue } from "zod";

// =============================================================================
// SHARED SCHEMAS
// =============================================================================

// YAML reads an unquoted 3.10 as the number 3.1, so versions must be strings.
export const VersionSchema = z
  .string()
  .regex(/^\s*\d+\.\d+\s*$/, "Expected a <major>.<minor> version");

export const VersionSelectionSchema = z.union([z.literal("all"), z.array(VersionSchema)]);

// A release or one of the pseudo versions that stand for a moving target.
export const SecondaryLabelSchema = z.union([VersionSchema, z.enum(["devel", "milestone"])]);

export const CompatibilityEntrySchema = z
  .object({
    primary: VersionSchema,
    secondary: z.array(VersionSchema).default([]),
    controller_only: z.boolean().default(false),
    controller: z.array(VersionSchema).optional(),
  })
  .strict();

export const CompatibilityTableSchema = z.array(CompatibilityEntrySchema);

export const PseudoVersionTargetsSchema = z
  .object({
    devel: VersionSchema.optional(),
    milestone: VersionSchema.optional(),
  })
  .strict();

/** Shape of the built-in table shipped in `data/compatibility.json`. */
export const BuiltInTableSchema = z
  .object({
    devel: VersionSchema,
    milestone: VersionSchema,
    entries: CompatibilityTableSchema,
  })
  .strict();

// =============================================================================
// SESSION SCHEMAS
// =============================================================================

export const SESSION_GROUPS = [
  "formatters",
  "codeqa",
  "typing",
  "docs",
  "license",
  "extra",
  "build",
  "custom",
  "tests",
] as const;

export const LintSessionSchema = z
  .object({
    default: z.boolean().default(true),
    formatters: z.boolean().default(true),
    codeqa: z.boolean().default(true),
    yamllint: z.boolean().default(false),
    typing: z.boolean().default(true),
    config_lint: z.boolean().default(true),
  })
  .strict();

export const SimpleSessionSchema = z
  .object({
    default: z.boolean().default(true),
  })
  .strict();

export const ActionGroupSchema = z
  .object({
    name: z.string().min(1),
    pattern: z.string().min(1),
    required_attribute: z.string().min(1),
    exclusions: z.array(z.string()).default([]),
    members: z.array(z.string()).optional(),
  })
  .strict()
  .superRefine((group, ctx) => {
    try {
      new RegExp(group.pattern);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pattern"],
        message: `Invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  });

export const ExtraChecksSessionSchema = z
  .object({
    default: z.boolean().default(true),
    action_groups: z.array(ActionGroupSchema).default([]),
  })
  .strict();

export const DevelLikeBranchSchema = z
  .object({
    repository: z.string().min(1).nullable().default(null),
    branch: z.string().min(1),
  })
  .strict();

export const TestKindSessionSchema = z
  .object({
    default: z.boolean().default(false),
    primary: VersionSelectionSchema.default("all"),
    secondary: VersionSelectionSchema.default("all"),
    min_version: VersionSchema.nullable().default(null),
    max_version: VersionSchema.nullable().default(null),
    except_versions: z.array(SecondaryLabelSchema).default([]),
    local_only: z.boolean().default(false),
    include_devel: z.boolean().default(false),
    include_milestone: z.boolean().default(false),
    add_devel_like_branches: z.array(DevelLikeBranchSchema).default([]),
    controller_versions_only: z.boolean().default(false),
  })
  .strict();

export const LintToolSessionSchema = z
  .object({
    default: z.boolean().default(true),
    strict: z.boolean().default(false),
  })
  .strict();

export const ExecutionEnvironmentSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().min(1),
  })
  .strict();

export const EnvironmentCheckSessionSchema = z
  .object({
    default: z.boolean().default(false),
    execution_environments: z.array(ExecutionEnvironmentSchema).default([]),
  })
  .strict();

export const ScenarioSessionSchema = z
  .object({
    default: z.boolean().default(false),
    scenarios: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const CustomSessionSchema = z
  .object({
    name: z.string().min(1),
    depends_on: z.array(z.string().min(1)).default([]),
    default: z.boolean().default(false),
    group: z.enum(SESSION_GROUPS).default("custom"),
    description: z.string().optional(),
  })
  .strict();

export const SessionsConfigSchema = z
  .object({
    lint: LintSessionSchema.optional(),
    docs_check: SimpleSessionSchema.optional(),
    license_check: SimpleSessionSchema.optional(),
    extra_checks: ExtraChecksSessionSchema.optional(),
    build_import_check: SimpleSessionSchema.optional(),
    sanity: TestKindSessionSchema.optional(),
    units: TestKindSessionSchema.optional(),
    integration: TestKindSessionSchema.optional(),
    ansible_lint: LintToolSessionSchema.optional(),
    ee_check: EnvironmentCheckSessionSchema.optional(),
    molecule: ScenarioSessionSchema.optional(),
    custom: z.array(CustomSessionSchema).default([]),
  })
  .strict();

// =============================================================================
// PROJECT CONFIG
// =============================================================================

export const InventoryItemSchema = z
  .object({
    name: z.string().min(1),
    attributes: z.array(z.string()).default([]),
  })
  .strict();

export const LocalDetectionSchema = z
  .object({
    command: z.string().min(1).default("python{version}"),
    args: z.array(z.string()).default(["--version"]),
    timeout_seconds: z.number().positive().default(10),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    compatibility: CompatibilityTableSchema.optional(),
    pseudo_versions: PseudoVersionTargetsSchema.optional(),
    local_detection: LocalDetectionSchema.optional(),
    sessions: SessionsConfigSchema.default({}),
    inventory: z.array(InventoryItemSchema).default([]),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type SessionsConfig = z.infer<typeof SessionsConfigSchema>;
export type TestKindSessionConfig = z.infer<typeof TestKindSessionSchema>;
export type ActionGroupConfig = z.infer<typeof ActionGroupSchema>;
export type CustomSessionConfig = z.infer<typeof CustomSessionSchema>;
export type CompatibilityEntryConfig = z.infer<typeof CompatibilityEntrySchema>;
export type LocalDetectionConfig = z.infer<typeof LocalDetectionSchema>;

// =============================================================================
// ISSUE FORMATTING
// =============================================================================

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
