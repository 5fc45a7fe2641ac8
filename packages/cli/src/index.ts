#!/usr/bin/env node
import { writeFileSync } from 'node:fs';
import { Command } from 'commander';
import {
  AdvisorTypeSchema,
  CostTypeSchema,
  type DispatchResult,
} from '@supabase-mcp/shared-types';
import { ConnectorCheck, defaultReportName, type Logger } from './check.js';
import { SupabaseMcpClient } from './client.js';
import { ACCESS_TOKEN_ENV, getConfigPath, readConfig, resolveRuntimeConfig, writeConfig } from './config.js';
import { CommandDispatcher } from './dispatcher.js';
import { spawnProcess, type ProcessRunner } from './process.js';
import { CliError, errorEnvelope, fromDispatchError } from './errors.js';
import { renderOutput, type OutputMode } from './output.js';
import { completionScript, type CompletionShell } from './completions.js';
import { buildOverview } from './overview.js';
import { parseInput, parseLimit, readInputFile } from './input.js';
import { checkProjectHealth } from './health.js';

type GlobalOptions = {
  executable?: string;
  server?: string;
  timeout?: string;
  verbose?: boolean;
  json?: boolean;
  human?: boolean;
  markdown?: boolean;
};

function pickOutputMode(options: GlobalOptions): OutputMode {
  if (options.markdown) {
    return 'markdown';
  }
  if (options.human) {
    return 'human';
  }
  if (options.json) {
    return 'json';
  }
  if (!process.stdout.isTTY) {
    return 'json';
  }
  return 'human';
}

const stderrLogger: Logger = (level, message) => {
  process.stderr.write(`[supabase-mcp] ${level === 'info' ? '' : `${level}: `}${message}\n`);
};

function resolveDispatcher(options: GlobalOptions) {
  const runtime = resolveRuntimeConfig({
    executable: options.executable,
    serverName: options.server,
    timeout: options.timeout,
  });

  if (!runtime.accessTokenPresent) {
    process.stderr.write(`[supabase-mcp] Warning: ${ACCESS_TOKEN_ENV} not set. Some operations may fail.\n`);
  }

  const runner: ProcessRunner | undefined = options.verbose
    ? (request) => {
        process.stderr.write(`[supabase-mcp] Executing: ${[request.executable, ...request.args].join(' ')}\n`);
        return spawnProcess(request);
      }
    : undefined;

  const dispatcher = new CommandDispatcher({
    executable: runtime.executable,
    serverName: runtime.serverName,
    timeoutMs: runtime.timeoutMs,
    runner,
  });

  return { dispatcher, runtime };
}

function globalOptions(command: Command) {
  return command.parent?.opts<GlobalOptions>() ?? {};
}

function unwrap<T>(result: DispatchResult<T>): T {
  if (!result.ok) {
    throw fromDispatchError(result.error);
  }
  return result.data;
}

function printData(command: string, data: unknown, mode: OutputMode) {
  if (mode === 'human' && typeof data === 'string') {
    console.log(data);
    return;
  }
  console.log(renderOutput(command, data, mode));
}

function resolveCompletionShell(input?: string): CompletionShell {
  const normalized = (input ?? 'zsh').toLowerCase();
  if (normalized === 'bash' || normalized === 'zsh' || normalized === 'fish') {
    return normalized;
  }
  throw new CliError('VALIDATION_ERROR', 'Shell must be one of: bash, zsh, fish', 1);
}

function completionCommands(program: Command) {
  return [
    ...new Set(
      program.commands.flatMap((registered) => [registered.name(), ...registered.aliases()]),
    ),
  ];
}

async function run() {
  const program = new Command();

  program
    .name('supabase-mcp')
    .description('Call the database platform management API through the MCP command-line connector')
    .version(process.env.npm_package_version ?? '0.1.0')
    .option('--executable <path>', 'Connector executable (default: manus-mcp-cli)')
    .option('--server <name>', 'MCP server name (default: supabase)')
    .option('--timeout <seconds>', 'Seconds to wait for each call (default: 30)')
    .option('--verbose', 'Print each spawned command to stderr')
    .option('--json', 'Render machine-parseable JSON output')
    .option('--human', 'Render human-readable output')
    .option('--markdown', 'Render markdown output');

  program.addHelpText(
    'after',
    `\nAuthenticated operations need ${ACCESS_TOKEN_ENV} in the environment.\nDefault output is human-readable in TTY and JSON when piped/non-interactive.\nEnv overrides: \`SUPABASE_MCP_EXECUTABLE\`, \`SUPABASE_MCP_SERVER\`, \`SUPABASE_MCP_TIMEOUT_SECONDS\`.`,
  );

  program
    .command('call <operation>')
    .description('Invoke any operation with a JSON argument object')
    .option('--input <json>', 'Arguments as a JSON object', '{}')
    .option('--input-file <path>', 'Read arguments from a JSON file')
    .action(async (operation: string, options: { input: string; inputFile?: string }, command: Command) => {
      const global = globalOptions(command);
      const args = options.inputFile
        ? parseInput(readInputFile(options.inputFile), options.inputFile)
        : parseInput(options.input, '--input');
      const { dispatcher } = resolveDispatcher(global);
      const data = unwrap(await dispatcher.invoke(operation, args));
      printData(operation, data, pickOutputMode(global));
    });

  program
    .command('tools')
    .description('List the operations the connector exposes')
    .action(async (_options: unknown, command: Command) => {
      const global = globalOptions(command);
      const { dispatcher } = resolveDispatcher(global);
      printData('tools', unwrap(await dispatcher.listTools()), pickOutputMode(global));
    });

  program
    .command('docs <query>')
    .description('Search platform documentation')
    .option('--limit <n>', 'Max results', '5')
    .action(async (query: string, options: { limit: string }, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      const data = unwrap(await client.searchDocs(query, parseLimit(options.limit)));
      printData('docs', data, pickOutputMode(global));
    });

  program
    .command('orgs')
    .alias('organizations')
    .description('List organizations')
    .action(async (_options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('orgs', unwrap(await client.listOrganizations()), pickOutputMode(global));
    });

  program
    .command('projects')
    .description('List projects')
    .action(async (_options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      const listing = unwrap(await client.listProjects());
      if (listing.skipped > 0) {
        stderrLogger('warning', `Skipping ${listing.skipped} project entries with missing fields`);
      }
      printData('projects', listing, pickOutputMode(global));
    });

  program
    .command('project <id>')
    .description('Show project details')
    .action(async (id: string, _options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('project', unwrap(await client.getProject(id)), pickOutputMode(global));
    });

  program
    .command('tables <projectId>')
    .description('List database tables')
    .option('--schema <name...>', 'Schemas to include (default: all)')
    .action(async (projectId: string, options: { schema?: string[] }, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      const data = unwrap(await client.listTables(projectId, options.schema ?? []));
      printData('tables', data, pickOutputMode(global));
    });

  program
    .command('extensions <projectId>')
    .description('List database extensions')
    .action(async (projectId: string, _options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('extensions', unwrap(await client.listExtensions(projectId)), pickOutputMode(global));
    });

  program
    .command('migrations <projectId>')
    .description('List applied migrations')
    .action(async (projectId: string, _options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('migrations', unwrap(await client.listMigrations(projectId)), pickOutputMode(global));
    });

  program
    .command('sql <projectId> <query>')
    .description('Execute SQL against the project database')
    .action(async (projectId: string, query: string, _options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('sql', unwrap(await client.executeSql(projectId, query)), pickOutputMode(global));
    });

  program
    .command('logs <projectId>')
    .description('Fetch recent service logs')
    .requiredOption('--service <service>', 'api|postgres|edge-function|auth|storage|realtime')
    .action(async (projectId: string, options: { service: string }, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('logs', unwrap(await client.getLogs(projectId, options.service)), pickOutputMode(global));
    });

  program
    .command('advisors <projectId>')
    .description('Show security and performance advisors')
    .option('--type <type>', 'security|performance|all', 'all')
    .action(async (projectId: string, options: { type: string }, command: Command) => {
      const global = globalOptions(command);
      const type = AdvisorTypeSchema.safeParse(options.type);
      if (!type.success) {
        throw new CliError('VALIDATION_ERROR', 'Advisor type must be one of: security, performance, all', 1);
      }
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('advisors', unwrap(await client.getAdvisors(projectId, type.data)), pickOutputMode(global));
    });

  program
    .command('types <projectId>')
    .description('Generate TypeScript types from the database schema')
    .option('--out <file>', 'Write the types to a file instead of stdout')
    .action(async (projectId: string, options: { out?: string }, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      const types = unwrap(await client.generateTypescriptTypes(projectId));
      if (options.out) {
        writeFileSync(options.out, types);
        stderrLogger('success', `Saved types to ${options.out}`);
        return;
      }
      printData('types', types, pickOutputMode(global));
    });

  program
    .command('functions <projectId>')
    .description('List Edge Functions')
    .action(async (projectId: string, _options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('functions', unwrap(await client.listEdgeFunctions(projectId)), pickOutputMode(global));
    });

  program
    .command('branches <projectId>')
    .description('List development branches')
    .action(async (projectId: string, _options: unknown, command: Command) => {
      const global = globalOptions(command);
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('branches', unwrap(await client.listBranches(projectId)), pickOutputMode(global));
    });

  program
    .command('cost')
    .description('Show the cost of creating a project or branch')
    .requiredOption('--type <type>', 'project|branch')
    .requiredOption('--organization-id <id>', 'Organization id')
    .action(async (options: { type: string; organizationId: string }, command: Command) => {
      const global = globalOptions(command);
      const type = CostTypeSchema.safeParse(options.type);
      if (!type.success) {
        throw new CliError('VALIDATION_ERROR', 'Cost type must be one of: project, branch', 1);
      }
      const client = new SupabaseMcpClient(resolveDispatcher(global).dispatcher);
      printData('cost', unwrap(await client.getCost(type.data, options.organizationId)), pickOutputMode(global));
    });

  program
    .command('check')
    .description('Run the connector self-check suites')
    .option('--ci', 'Mark the report as a CI run and force JSON output')
    .option('--report <path>', 'Also write the report to a file (use "auto" for a timestamped name)')
    .action(async (options: { ci?: boolean; report?: string }, command: Command) => {
      const global = globalOptions(command);
      const { dispatcher } = resolveDispatcher(global);
      const report = await new ConnectorCheck(dispatcher, {
        ciMode: Boolean(options.ci),
        log: stderrLogger,
      }).run();

      if (options.report) {
        const path = options.report === 'auto' ? defaultReportName(new Date(report.timestamp)) : options.report;
        writeFileSync(path, JSON.stringify(report, null, 2));
        stderrLogger('info', `Report saved to: ${path}`);
      }

      printData('check', report, options.ci ? 'json' : pickOutputMode(global));
      if (report.summary.failed > 0) {
        process.exitCode = 1;
      }
    });

  program
    .command('overview')
    .description('Summarize organizations, projects, database, security, functions and branches')
    .option('--project-id <id>', 'Project to inspect (default: first listed)')
    .action(async (options: { projectId?: string }, command: Command) => {
      const global = globalOptions(command);
      const { dispatcher } = resolveDispatcher(global);
      const report = await buildOverview(dispatcher, { projectId: options.projectId, log: stderrLogger });
      printData('overview', report, pickOutputMode(global));
    });

  program
    .command('health')
    .description('Check every project for status and critical or warning security advisors')
    .action(async (_options: unknown, command: Command) => {
      const global = globalOptions(command);
      const { dispatcher } = resolveDispatcher(global);
      const report = await checkProjectHealth(dispatcher, { log: stderrLogger });
      printData('health', report, pickOutputMode(global));
    });

  program
    .command('configure')
    .description('Persist the global --executable, --server and --timeout values as defaults')
    .action((_options: unknown, command: Command) => {
      const global = globalOptions(command);
      const resolved = resolveRuntimeConfig(
        { executable: global.executable, serverName: global.server, timeout: global.timeout },
        {},
        readConfig(),
      );
      const next = {
        executable: resolved.executable,
        serverName: resolved.serverName,
        timeoutSeconds: resolved.timeoutMs / 1000,
      };
      writeConfig(next);
      printData('configure', { path: getConfigPath(), ...next }, pickOutputMode(global));
    });

  program
    .command('completion [shell]')
    .alias('completions')
    .description('Print shell completion script')
    .option('--shell <shell>', 'bash|zsh|fish')
    .action((shellArg: string | undefined, options: { shell?: string }, command: Command) => {
      const global = globalOptions(command);
      const shell = resolveCompletionShell(options.shell ?? shellArg ?? 'zsh');
      const script = completionScript(shell, completionCommands(program));
      const mode = pickOutputMode(global);

      if (mode === 'json') {
        printData('completion', { shell, script }, mode);
        return;
      }

      console.log(script);
    });

  await program.parseAsync(process.argv);
}

run().catch((error: unknown) => {
  if (error instanceof CliError) {
    console.error(JSON.stringify(errorEnvelope(error.code, error.message, error.details), null, 2));
    process.exit(error.exitCode);
  }

  const message = error instanceof Error ? error.message : 'Unknown CLI error';
  console.error(JSON.stringify(errorEnvelope('UNEXPECTED_ERROR', message), null, 2));
  process.exit(1);
});
