import type { z } from "zod";
import {
  AdvisorSchema,
  BranchSchema,
  DocNodeSchema,
  EdgeFunctionSchema,
  EXIT_SENTINELS,
  ExtensionSchema,
  OrganizationSchema,
  ProjectSchema,
  TableSchema,
  isJsonObject,
  type AdvisorType,
  type CatalogOperation,
  type CostType,
  type DispatchResult,
  type JsonObject,
  type JsonValue,
  type Project
} from "@supabase-mcp/shared-types";
import { failure, type CommandDispatcher } from "./dispatcher.js";

export interface ProjectListing {
  projects: Project[];
  skipped: number;
}

export interface EdgeFunctionFile {
  name: string;
  content: string;
}

function listField<S extends z.ZodTypeAny>(data: JsonValue, key: string, schema: S) {
  const items: z.infer<S>[] = [];
  let skipped = 0;
  const entries = isJsonObject(data) ? data[key] : undefined;
  if (!Array.isArray(entries)) {
    return { items, skipped };
  }

  for (const entry of entries) {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      items.push(parsed.data);
    } else {
      skipped += 1;
    }
  }
  return { items, skipped };
}

export function docsQuery(query: string, limit: number) {
  return `{ searchDocs(query: ${JSON.stringify(query)}, limit: ${limit}) { nodes { title href content } } }`;
}

export class SupabaseMcpClient {
  constructor(private readonly dispatcher: CommandDispatcher) {}

  private async call<T>(
    operation: CatalogOperation,
    args: JsonObject,
    select: (data: JsonValue) => DispatchResult<T>
  ): Promise<DispatchResult<T>> {
    const result = await this.dispatcher.invoke(operation, args);
    if (!result.ok) {
      return result;
    }
    return select(result.data);
  }

  private raw(operation: CatalogOperation, args: JsonObject) {
    return this.dispatcher.invoke(operation, args);
  }

  private list<S extends z.ZodTypeAny>(
    operation: CatalogOperation,
    args: JsonObject,
    key: string,
    schema: S
  ) {
    return this.call(operation, args, (data) => ({
      ok: true as const,
      data: listField(data, key, schema).items
    }));
  }

  searchDocs(query: string, limit = 5) {
    return this.call("search_docs", { graphql_query: docsQuery(query, limit) }, (data) => {
      const searchDocs = isJsonObject(data) ? data.searchDocs : undefined;
      return {
        ok: true as const,
        data: searchDocs === undefined ? [] : listField(searchDocs, "nodes", DocNodeSchema).items
      };
    });
  }

  listOrganizations() {
    return this.list("list_organizations", {}, "organizations", OrganizationSchema);
  }

  getOrganization(id: string) {
    return this.raw("get_organization", { id });
  }

  listProjects(): Promise<DispatchResult<ProjectListing>> {
    return this.call("list_projects", {}, (data) => {
      const { items, skipped } = listField(data, "projects", ProjectSchema);
      return { ok: true as const, data: { projects: items, skipped } };
    });
  }

  getProject(id: string) {
    return this.raw("get_project", { id });
  }

  listTables(projectId: string, schemas: string[] = []) {
    const args: JsonObject = { project_id: projectId };
    if (schemas.length > 0) {
      args.schemas = schemas;
    }
    return this.list("list_tables", args, "tables", TableSchema);
  }

  listExtensions(projectId: string) {
    return this.list("list_extensions", { project_id: projectId }, "extensions", ExtensionSchema);
  }

  listMigrations(projectId: string) {
    return this.raw("list_migrations", { project_id: projectId });
  }

  applyMigration(projectId: string, name: string, query: string) {
    return this.raw("apply_migration", { project_id: projectId, name, query });
  }

  executeSql(projectId: string, query: string) {
    return this.raw("execute_sql", { project_id: projectId, query });
  }

  getLogs(projectId: string, service: string) {
    return this.raw("get_logs", { project_id: projectId, service });
  }

  getAdvisors(projectId: string, type: AdvisorType = "all") {
    return this.list("get_advisors", { project_id: projectId, type }, "advisors", AdvisorSchema);
  }

  getProjectUrl(projectId: string) {
    return this.raw("get_project_url", { project_id: projectId });
  }

  getAnonKey(projectId: string) {
    return this.raw("get_anon_key", { project_id: projectId });
  }

  generateTypescriptTypes(projectId: string): Promise<DispatchResult<string>> {
    return this.call("generate_typescript_types", { project_id: projectId }, (data) => {
      const types = isJsonObject(data) ? data.types : undefined;
      if (typeof types !== "string") {
        return failure(
          "DecodeError",
          "Response did not include generated types",
          EXIT_SENTINELS.decodeFailed
        );
      }
      return { ok: true as const, data: types };
    });
  }

  listEdgeFunctions(projectId: string) {
    return this.list("list_edge_functions", { project_id: projectId }, "functions", EdgeFunctionSchema);
  }

  deployEdgeFunction(projectId: string, name: string, files: EdgeFunctionFile[]) {
    return this.raw("deploy_edge_function", {
      project_id: projectId,
      name,
      files: files.map((file) => ({ name: file.name, content: file.content }))
    });
  }

  listBranches(projectId: string) {
    return this.list("list_branches", { project_id: projectId }, "branches", BranchSchema);
  }

  getCost(type: CostType, organizationId: string) {
    return this.raw("get_cost", { type, organization_id: organizationId });
  }
}
