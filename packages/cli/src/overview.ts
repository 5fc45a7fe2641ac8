import {
  HEALTHY_PROJECT_STATUS,
  type Advisor,
  type Branch,
  type DispatchResult,
  type EdgeFunction,
  type JsonValue,
  type OverviewError
} from "@supabase-mcp/shared-types";
import { SupabaseMcpClient } from "./client.js";
import type { CommandDispatcher } from "./dispatcher.js";
import type { Logger } from "./check.js";

export interface ProjectSummary {
  id: string;
  name: string;
  region: string;
  status: string;
  healthy: boolean;
}

export interface OverviewReport {
  timestamp: string;
  project_id: string | null;
  organizations: Array<{ id: string; name: string }>;
  projects: ProjectSummary[];
  database: {
    tables: string[];
    extensions: string[];
    types_generated: boolean;
  } | null;
  security: {
    total: number;
    security: number;
    performance: number;
    top: Advisor[];
  } | null;
  edge_functions: EdgeFunction[];
  branches: Branch[];
  branch_cost: JsonValue | null;
  tools_used: string[];
  errors: OverviewError[];
}

export interface OverviewOptions {
  projectId?: string;
  log?: Logger;
  now?: () => number;
}

export async function buildOverview(
  dispatcher: CommandDispatcher,
  options: OverviewOptions = {}
): Promise<OverviewReport> {
  const client = new SupabaseMcpClient(dispatcher);
  const log = options.log ?? (() => undefined);
  const now = options.now ?? Date.now;
  const toolsUsed: string[] = [];
  const errors: OverviewError[] = [];

  async function track<T>(operation: string, call: () => Promise<DispatchResult<T>>) {
    toolsUsed.push(operation);
    const result = await call();
    if (!result.ok) {
      log("warning", `${operation} failed: ${result.error.message}`);
      errors.push({ operation, message: result.error.message, code: result.error.code });
      return undefined;
    }
    return result.data;
  }

  log("info", "Organization & project management");
  const organizations = (await track("list_organizations", () => client.listOrganizations())) ?? [];
  const listing = await track("list_projects", () => client.listProjects());
  if (listing && listing.skipped > 0) {
    log("warning", `Skipped ${listing.skipped} project entries with missing fields`);
  }
  const projects = (listing?.projects ?? []).map((project) => ({
    id: project.id,
    name: project.name,
    region: project.region,
    status: project.status,
    healthy: project.status === HEALTHY_PROJECT_STATUS
  }));

  const projectId = options.projectId ?? projects[0]?.id;
  let database: OverviewReport["database"] = null;
  let security: OverviewReport["security"] = null;
  let edgeFunctions: EdgeFunction[] = [];
  let branches: Branch[] = [];

  if (projectId) {
    log("info", `Database operations for ${projectId}`);
    const tables = (await track("list_tables", () => client.listTables(projectId))) ?? [];
    const extensions = (await track("list_extensions", () => client.listExtensions(projectId))) ?? [];
    const types = await track("generate_typescript_types", () =>
      client.generateTypescriptTypes(projectId)
    );
    database = {
      tables: tables.map((table) => `${table.schema ?? "public"}.${table.name}`),
      extensions: extensions.map((extension) => extension.name),
      types_generated: types !== undefined
    };

    log("info", "Security & performance analysis");
    const advisors = await track("get_advisors", () => client.getAdvisors(projectId, "all"));
    if (advisors) {
      security = {
        total: advisors.length,
        security: advisors.filter((advisor) => advisor.type === "security").length,
        performance: advisors.filter((advisor) => advisor.type === "performance").length,
        top: advisors.slice(0, 3)
      };
    }

    log("info", "Edge Functions");
    edgeFunctions = (await track("list_edge_functions", () => client.listEdgeFunctions(projectId))) ?? [];

    log("info", "Branches");
    branches = (await track("list_branches", () => client.listBranches(projectId))) ?? [];
  } else {
    log("warning", "No project available for database, security, function and branch sections");
  }

  let branchCost: JsonValue | null = null;
  const organizationId = organizations[0]?.id;
  if (organizationId) {
    branchCost = (await track("get_cost", () => client.getCost("branch", organizationId))) ?? null;
  }

  return {
    timestamp: new Date(now()).toISOString(),
    project_id: projectId ?? null,
    organizations: organizations.map((organization) => ({
      id: organization.id,
      name: organization.name
    })),
    projects,
    database,
    security,
    edge_functions: edgeFunctions,
    branches,
    branch_cost: branchCost,
    tools_used: toolsUsed,
    errors
  };
}
