import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

/** Structural check that keeps the value as parsed: no copy, no finiteness rule. */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === "object") {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const OperationNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/);

export const OPERATION_DESCRIPTIONS = {
  search_docs: "Search the platform documentation with a GraphQL query",
  list_organizations: "List the organizations the access token can see",
  get_organization: "Get one organization, including its plan",
  list_projects: "List every project across organizations",
  get_project: "Get one project by id",
  create_project: "Create a project (requires a confirmed cost)",
  pause_project: "Pause a project",
  restore_project: "Restore a paused project",
  list_tables: "List tables in the given schemas",
  list_extensions: "List database extensions",
  list_migrations: "List applied migrations",
  apply_migration: "Apply a named DDL migration",
  execute_sql: "Execute raw SQL against the project database",
  get_logs: "Fetch recent logs for a service",
  get_advisors: "Fetch security and performance advisors",
  get_project_url: "Get the API URL of a project",
  get_anon_key: "Get the anonymous API key of a project",
  generate_typescript_types: "Generate TypeScript types from the database schema",
  list_edge_functions: "List Edge Functions",
  get_edge_function: "Get the files of one Edge Function",
  deploy_edge_function: "Deploy an Edge Function",
  create_branch: "Create a development branch (requires a confirmed cost)",
  list_branches: "List development branches",
  delete_branch: "Delete a development branch",
  merge_branch: "Merge a branch into production",
  reset_branch: "Reset a branch to a clean state",
  rebase_branch: "Rebase a branch onto production",
  get_cost: "Get the cost of creating a project or branch",
  confirm_cost: "Confirm a cost before creating a project or branch"
} as const;

export type CatalogOperation = keyof typeof OPERATION_DESCRIPTIONS;

export const OPERATION_CATALOG = Object.keys(OPERATION_DESCRIPTIONS).filter(isCatalogOperation);

export function isCatalogOperation(name: string): name is CatalogOperation {
  return Object.prototype.hasOwnProperty.call(OPERATION_DESCRIPTIONS, name);
}

export const DispatchErrorKindSchema = z.enum([
  "InvocationError",
  "TimeoutError",
  "RemoteError",
  "DecodeError"
]);

export const EXIT_SENTINELS = {
  timeout: -1,
  executableNotFound: -2,
  startFailed: -3,
  invalidRequest: -4,
  decodeFailed: 0
} as const;

export const DispatchErrorSchema = z.object({
  kind: DispatchErrorKindSchema,
  message: z.string(),
  code: z.number().int(),
  details: JsonObjectSchema.optional()
});

// Shape a failing tool may print on stdout or stderr.
export const RemoteFailureSchema = z.object({
  error: z.string(),
  returncode: z.number().int().optional()
});

export type DispatchErrorKind = z.infer<typeof DispatchErrorKindSchema>;
export type DispatchError = z.infer<typeof DispatchErrorSchema>;
export type DispatchResult<T = JsonValue> =
  | { ok: true; data: T }
  | { ok: false; error: DispatchError };

export const HEALTHY_PROJECT_STATUS = "ACTIVE_HEALTHY";

export const OrganizationSchema = z
  .object({
    id: z.string().min(1),
    name: z.string()
  })
  .passthrough();

export const ProjectSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    organization_id: z.string(),
    region: z.string(),
    status: z.string(),
    created_at: z.string()
  })
  .passthrough();

export const TableSchema = z
  .object({
    name: z.string(),
    schema: z.string().optional()
  })
  .passthrough();

export const ExtensionSchema = z
  .object({
    name: z.string(),
    schema: z.string().nullish(),
    installed_version: z.string().nullish()
  })
  .passthrough();

export const AdvisorTypeSchema = z.enum(["security", "performance", "all"]);

export const AdvisorSchema = z
  .object({
    type: z.string().optional(),
    level: z.string().optional(),
    message: z.string().optional()
  })
  .passthrough();

export const DocNodeSchema = z.object({
  title: z.string(),
  href: z.string(),
  content: z.string()
});

export const EdgeFunctionSchema = z
  .object({
    name: z.string(),
    status: z.string().optional(),
    version: z.union([z.string(), z.number()]).optional()
  })
  .passthrough();

export const BranchSchema = z
  .object({
    name: z.string(),
    status: z.string().optional()
  })
  .passthrough();

export const CostTypeSchema = z.enum(["project", "branch"]);

export const CheckSuiteResultSchema = z.object({
  name: z.string(),
  passed: z.boolean(),
  duration: z.number().nonnegative(),
  notes: z.array(z.string()),
  error: z.string().optional()
});

export const CheckReportSchema = z.object({
  timestamp: z.string().datetime(),
  duration_seconds: z.number().nonnegative(),
  ci_mode: z.boolean(),
  test_results: z.array(CheckSuiteResultSchema),
  summary: z.object({
    total_tests: z.number().int().nonnegative(),
    passed: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    success_rate: z.number().min(0).max(100)
  })
});

export const OverviewErrorSchema = z.object({
  operation: z.string(),
  message: z.string(),
  code: z.number().int()
});

export type Organization = z.infer<typeof OrganizationSchema>;
export type Project = z.infer<typeof ProjectSchema>;
export type Table = z.infer<typeof TableSchema>;
export type Extension = z.infer<typeof ExtensionSchema>;
export type AdvisorType = z.infer<typeof AdvisorTypeSchema>;
export type Advisor = z.infer<typeof AdvisorSchema>;
export type DocNode = z.infer<typeof DocNodeSchema>;
export type EdgeFunction = z.infer<typeof EdgeFunctionSchema>;
export type Branch = z.infer<typeof BranchSchema>;
export type CostType = z.infer<typeof CostTypeSchema>;
export type CheckSuiteResult = z.infer<typeof CheckSuiteResultSchema>;
export type CheckReport = z.infer<typeof CheckReportSchema>;
export type OverviewError = z.infer<typeof OverviewErrorSchema>;
