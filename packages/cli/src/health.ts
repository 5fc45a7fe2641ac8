import { HEALTHY_PROJECT_STATUS, type OverviewError } from "@supabase-mcp/shared-types";
import { SupabaseMcpClient } from "./client.js";
import type { CommandDispatcher } from "./dispatcher.js";
import type { Logger } from "./check.js";

const SECURITY_ISSUE_LEVELS = new Set(["critical", "warning"]);

export interface ProjectHealth {
  id: string;
  name: string;
  status: string;
  healthy: boolean;
  /** Critical or warning security advisors; null when advisors could not be fetched. */
  security_issues: number | null;
}

export interface HealthReport {
  projects: ProjectHealth[];
  errors: OverviewError[];
}

export async function checkProjectHealth(
  dispatcher: CommandDispatcher,
  options: { log?: Logger } = {}
): Promise<HealthReport> {
  const client = new SupabaseMcpClient(dispatcher);
  const log = options.log ?? (() => undefined);
  const errors: OverviewError[] = [];

  const listing = await client.listProjects();
  if (!listing.ok) {
    log("error", `list_projects failed: ${listing.error.message}`);
    return {
      projects: [],
      errors: [{ operation: "list_projects", message: listing.error.message, code: listing.error.code }]
    };
  }

  const projects: ProjectHealth[] = [];
  for (const project of listing.data.projects) {
    const healthy = project.status === HEALTHY_PROJECT_STATUS;
    log(healthy ? "success" : "warning", `${project.name}: ${healthy ? "healthy" : project.status}`);

    const advisors = await client.getAdvisors(project.id, "security");
    let securityIssues: number | null = null;
    if (advisors.ok) {
      securityIssues = advisors.data.filter((advisor) =>
        SECURITY_ISSUE_LEVELS.has((advisor.level ?? "").toLowerCase())
      ).length;
      if (securityIssues > 0) {
        log("warning", `${project.name}: ${securityIssues} security issues found`);
      }
    } else {
      log("warning", `get_advisors failed for ${project.id}: ${advisors.error.message}`);
      errors.push({ operation: "get_advisors", message: advisors.error.message, code: advisors.error.code });
    }

    projects.push({
      id: project.id,
      name: project.name,
      status: project.status,
      healthy,
      security_issues: securityIssues
    });
  }

  return { projects, errors };
}
