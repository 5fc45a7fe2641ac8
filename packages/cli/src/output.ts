export type OutputMode = 'json' | 'human' | 'markdown';
const OUTPUT_SCHEMA_VERSION = '1.0.0';

type Fields = Record<string, unknown>;

function fields(value: unknown): Fields {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function text(value: unknown, fallback: string) {
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return fallback;
}

function entries(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function bulletList(items: string[]) {
  return items.map((item) => `- ${item}`).join('\n');
}

export function renderOutput(command: string, data: unknown, mode: OutputMode) {
  if (mode === 'json') {
    return JSON.stringify(
      {
        ok: true,
        schema_version: OUTPUT_SCHEMA_VERSION,
        command,
        data,
      },
      null,
      2,
    );
  }

  if (mode === 'markdown') {
    return renderMarkdown(command, data);
  }

  return renderHuman(command, data);
}

function renderHuman(command: string, data: unknown): string {
  if (command === 'docs' && Array.isArray(data)) {
    return renderRows(data, (doc) => [`${text(doc.title, 'untitled')}`, `  URL: ${text(doc.href, '--')}`]);
  }

  if (command === 'orgs' && Array.isArray(data)) {
    return renderRows(data, (org) => [
      `${text(org.name, 'Unknown')} (ID: ${text(org.id, 'N/A')})`,
    ]);
  }

  if (command === 'projects' && typeof data === 'object' && data !== null) {
    const listing = fields(data);
    const body = renderRows(entries(listing.projects), (project) => [
      `${text(project.name, 'unknown')} (${text(project.status, 'unknown')})`,
      `  ID: ${text(project.id, '--')} | Region: ${text(project.region, '--')}`,
    ]);
    const skipped = typeof listing.skipped === 'number' ? listing.skipped : 0;
    return skipped > 0 ? `${body}\n(skipped ${skipped} entries with missing fields)` : body;
  }

  if (command === 'tables' && Array.isArray(data)) {
    return renderRows(data, (table) => [`${text(table.schema, 'public')}.${text(table.name, 'unknown')}`]);
  }

  if (command === 'advisors' && Array.isArray(data)) {
    return renderRows(data, (advisor) => [
      `[${text(advisor.level, 'info')}] ${text(advisor.message, 'No message')}`,
    ]);
  }

  if (command === 'functions' && Array.isArray(data)) {
    return renderRows(data, (fn) => [
      `${text(fn.name, 'unknown')} (v${text(fn.version, 'unknown')}, ${text(fn.status, 'unknown')})`,
    ]);
  }

  if (command === 'branches' && Array.isArray(data)) {
    return renderRows(data, (branch) => [`${text(branch.name, 'unknown')} (${text(branch.status, 'unknown')})`]);
  }

  if (command === 'check' && typeof data === 'object' && data !== null) {
    return renderCheckHuman(fields(data));
  }

  if (command === 'health' && typeof data === 'object' && data !== null) {
    return renderRows(entries(fields(data).projects), (project) => {
      const issues = project.security_issues;
      return [
        `${text(project.name, 'unknown')}: ${project.healthy === true ? 'healthy' : text(project.status, 'unknown')}`,
        `  Security issues: ${typeof issues === 'number' ? issues : 'unavailable'}`,
      ];
    });
  }

  if (command === 'overview' && typeof data === 'object' && data !== null) {
    return renderOverviewHuman(fields(data));
  }

  if (Array.isArray(data)) {
    if (data.length === 0) {
      return 'No results.';
    }
    return data
      .map((entry, index) =>
        typeof entry === 'object' && entry !== null
          ? `${index + 1}. ${JSON.stringify(entry)}`
          : `${index + 1}. ${String(entry)}`,
      )
      .join('\n');
  }

  if (typeof data === 'object' && data !== null) {
    return Object.entries(fields(data))
      .map(([key, value]) => `${key}: ${JSON.stringify(value)}`)
      .join('\n');
  }

  return String(data);
}

function renderRows(data: unknown[], row: (item: Fields) => string[]) {
  if (data.length === 0) {
    return 'No results.';
  }
  return data.map((entry) => `• ${row(fields(entry)).join('\n')}`).join('\n');
}

function renderCheckHuman(report: Fields) {
  const summary = fields(report.summary);
  const rate = typeof summary.success_rate === 'number' ? summary.success_rate.toFixed(1) : '--';
  const suites = entries(report.test_results).map((entry) => {
    const suite = fields(entry);
    const status = suite.passed === true ? 'PASSED' : 'FAILED';
    const duration = typeof suite.duration === 'number' ? suite.duration.toFixed(2) : '--';
    return `${status} ${text(suite.name, 'unknown')} (${duration}s)`;
  });
  return [
    ...suites,
    '',
    `Total Tests: ${text(summary.total_tests, '0')}`,
    `Passed: ${text(summary.passed, '0')}`,
    `Failed: ${text(summary.failed, '0')}`,
    `Success Rate: ${rate}%`,
    `Duration: ${text(report.duration_seconds, '0')}s`,
  ].join('\n');
}

function renderOverviewHuman(report: Fields) {
  const database = fields(report.database);
  const security = fields(report.security);
  const projects = entries(report.projects).map((entry) => {
    const project = fields(entry);
    return `  ${project.healthy === true ? 'healthy' : text(project.status, 'unknown')} ${text(
      project.name,
      'unknown',
    )} (${text(project.region, '--')})`;
  });
  const errors = entries(report.errors).map((entry) => {
    const error = fields(entry);
    return `  ${text(error.operation, 'unknown')}: ${text(error.message, 'failed')}`;
  });

  return [
    `Organizations: ${entries(report.organizations).length}`,
    `Projects: ${projects.length}`,
    ...projects,
    `Project: ${text(report.project_id, 'none')}`,
    `Tables: ${entries(database.tables).length}`,
    `Extensions: ${entries(database.extensions).length}`,
    `Types generated: ${database.types_generated === true ? 'yes' : 'no'}`,
    `Advisors: ${text(security.total, '0')} (security ${text(security.security, '0')}, performance ${text(
      security.performance,
      '0',
    )})`,
    `Edge Functions: ${entries(report.edge_functions).length}`,
    `Branches: ${entries(report.branches).length}`,
    `Tools used: ${entries(report.tools_used).length}`,
    ...(errors.length > 0 ? ['Errors:', ...errors] : []),
  ].join('\n');
}

function renderMarkdown(command: string, data: unknown): string {
  if (command === 'check' && typeof data === 'object' && data !== null) {
    const report = fields(data);
    const summary = fields(report.summary);
    const rows = entries(report.test_results).map((entry) => {
      const suite = fields(entry);
      return `| ${text(suite.name, 'unknown')} | ${suite.passed === true ? 'passed' : 'failed'} | ${text(
        suite.duration,
        '0',
      )}s |`;
    });
    return [
      '## check',
      '',
      '| Suite | Result | Duration |',
      '| --- | --- | --- |',
      ...rows,
      '',
      `**Passed**: ${text(summary.passed, '0')} / ${text(summary.total_tests, '0')}`,
    ].join('\n');
  }

  if (Array.isArray(data)) {
    if (data.length === 0) {
      return `## ${command}\n\nNo results.`;
    }

    const blocks = data.map((entry, index) => {
      if (typeof entry === 'object' && entry !== null) {
        const named = fields(entry);
        const title = text(named.name, text(named.title, text(named.id, `Item ${index + 1}`)));
        return `### ${index + 1}. ${title}\n\n\`\`\`json\n${JSON.stringify(entry, null, 2)}\n\`\`\``;
      }
      return `- ${String(entry)}`;
    });

    return `## ${command}\n\n${blocks.join('\n\n')}`;
  }

  if (typeof data === 'object' && data !== null) {
    return `## ${command}\n\n${bulletList(
      Object.entries(fields(data)).map(([key, value]) => `**${key}**: ${JSON.stringify(value)}`),
    )}`;
  }

  return `## ${command}\n\n${String(data)}`;
}
