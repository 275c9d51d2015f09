/**
 * Command Line Interface
 *
 * Offline cycles, manual healing, the HTTP service and configuration.
 *
 * @module cli
 * @version 1.0.0
 */

import { Command } from 'commander';
import * as fs from 'node:fs';
import { type EngineConfig } from '../types/index.js';
import { getConfigPath, getHealingLogPath, loadConfig } from '../config/config.js';
import { DecisionAgent } from '../agent/decision-agent.js';
import { SnapshotNotReadyError } from '../decision/errors.js';
import { HealingLog } from '../audit/healing-log.js';
import { ConfigHealer, DEFAULT_HEALING_RULES } from '../resilience/config-healer.js';
import { startServer } from '../api/server.js';
import { cliLogger } from '../utils/logger.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function resolveEngineConfig(io: CliIO, configPath?: string): EngineConfig | null {
  const result = loadConfig(configPath);
  if (!result.success) {
    io.err(`Error: ${result.error.message}\n`);
    process.exitCode = 1;
    return null;
  }
  return result.data;
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('ladder')
    .description('Decision escalation engine for autonomous game agents')
    .version('1.0.0')
    .option('-c, --config <path>', 'Engine configuration file');

  // ═══════════════════════════════════════════════════════════════════════════
  // DECIDE
  // ═══════════════════════════════════════════════════════════════════════════

  program
    .command('decide')
    .description('Run one decision cycle for a snapshot file and print the Decision')
    .argument('<snapshot>', 'Path to a snapshot JSON file')
    .option('--remote', 'Consult the pattern and planner services', false)
    .action(async (snapshotPath: string, options: { remote: boolean }) => {
      const base = resolveEngineConfig(io, program.opts<{ config?: string }>().config);
      if (base === null) return;

      let input: unknown;
      try {
        input = JSON.parse(fs.readFileSync(snapshotPath, 'utf-8'));
      } catch (error) {
        io.err(`Error: cannot read snapshot: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exitCode = 1;
        return;
      }

      const config: EngineConfig = {
        ...base,
        pattern: { ...base.pattern, enabled: base.pattern.enabled && options.remote },
        planner: { ...base.planner, enabled: base.planner.enabled && options.remote },
      };
      const agent = new DecisionAgent({ config, healer: null });

      try {
        const outcome = await agent.runCycle(input);
        io.out(JSON.stringify(outcome.status === 'decided' ? outcome.decision : outcome, null, 2) + '\n');
      } catch (error) {
        if (error instanceof SnapshotNotReadyError) {
          io.err(`Snapshot not ready: ${error.message}\n`);
          for (const issue of error.issues) {
            io.err(`  - ${issue}\n`);
          }
          process.exitCode = 2;
          return;
        }
        throw error;
      }
    });

  // ═══════════════════════════════════════════════════════════════════════════
  // HEAL
  // ═══════════════════════════════════════════════════════════════════════════

  program
    .command('heal')
    .description('Neutralize conflicting directives in a host configuration file')
    .argument('<config>', 'Path to the host configuration file')
    .requiredOption('-r, --rule <name>', `Healing rule (${DEFAULT_HEALING_RULES.map((r) => r.name).join(', ')})`)
    .option('--dry-run', 'Show what would change without writing', false)
    .option('--log <path>', 'Healing log file')
    .option('--reason <text>', 'Reason recorded in the healing log', 'manual')
    .action(async (hostConfig: string, options: { rule: string; dryRun: boolean; log?: string; reason: string }) => {
      const engine = resolveEngineConfig(io, program.opts<{ config?: string }>().config);
      if (engine === null) return;

      const healer = new ConfigHealer({
        configPath: hostConfig,
        healingLog: new HealingLog(options.log ?? getHealingLogPath(engine)),
        reload: (configPath, rule) => io.out(`Reload requested for ${configPath} (${rule})\n`),
      });

      const result = await healer.heal(options.rule, options.reason, { dryRun: options.dryRun });
      if (!result.success) {
        io.err(`Error: ${result.error.message}\n`);
        process.exitCode = 1;
        return;
      }

      const outcome = result.data;
      if (outcome.directives.length === 0) {
        io.out('Nothing to heal\n');
        return;
      }

      io.out(`${outcome.dryRun ? 'Would disable' : 'Disabled'} ${outcome.directives.length} directive(s):\n`);
      for (const directive of outcome.directives) {
        io.out(`  ${directive}\n`);
      }
    });

  // ═══════════════════════════════════════════════════════════════════════════
  // HEALING LOG
  // ═══════════════════════════════════════════════════════════════════════════

  const logCmd = program.command('log').description('Inspect the healing log');

  logCmd
    .command('list')
    .description('List healing entries')
    .option('-n, --limit <count>', 'Number of entries to show', '20')
    .option('--file <path>', 'Healing log file')
    .action(async (options: { limit: string; file?: string }) => {
      const engine = resolveEngineConfig(io, program.opts<{ config?: string }>().config);
      if (engine === null) return;

      const healingLog = new HealingLog(options.file ?? getHealingLogPath(engine));
      const entries = await healingLog.list({ limit: parseInt(options.limit, 10) });
      if (entries.length === 0) {
        io.out('No healing entries\n');
        return;
      }
      for (const entry of entries) {
        io.out(`[${entry.sequence}] ${entry.timestamp} ${entry.rule}: ${entry.directives.join(', ')} (${entry.reason})\n`);
      }
    });

  logCmd
    .command('verify')
    .description('Verify the healing log hash chain')
    .option('--file <path>', 'Healing log file')
    .action(async (options: { file?: string }) => {
      const engine = resolveEngineConfig(io, program.opts<{ config?: string }>().config);
      if (engine === null) return;

      const result = await new HealingLog(options.file ?? getHealingLogPath(engine)).verify();
      if (result.valid) {
        io.out(`Healing log valid (${result.entriesChecked} entries)\n`);
      } else {
        io.err(`Healing log INVALID: ${result.error ?? 'unknown error'}\n`);
        process.exitCode = 1;
      }
    });

  // ═══════════════════════════════════════════════════════════════════════════
  // SERVE
  // ═══════════════════════════════════════════════════════════════════════════

  program
    .command('serve')
    .description('Start the decision service on 127.0.0.1')
    .option('-p, --port <port>', 'Port to listen on')
    .action(async (options: { port?: string }) => {
      const config = resolveEngineConfig(io, program.opts<{ config?: string }>().config);
      if (config === null) return;

      const port = options.port !== undefined ? parseInt(options.port, 10) : config.api.port;
      if (isNaN(port) || port < 1024 || port > 65535) {
        io.err('Error: Port must be between 1024 and 65535\n');
        process.exitCode = 1;
        return;
      }

      const agent = new DecisionAgent({ config });
      agent.eventBus.on('config:reload_requested', ({ configPath, rule }) => {
        cliLogger.warn({ configPath, rule }, 'Host configuration healed, reload requested');
      });

      const server = await startServer(agent, port);
      io.out(`Decision service listening on http://127.0.0.1:${port}\n`);

      const shutdown = async (): Promise<void> => {
        io.out('\nShutting down decision service...\n');
        await server.close();
      };
      process.once('SIGINT', () => void shutdown());
      process.once('SIGTERM', () => void shutdown());
    });

  // ═══════════════════════════════════════════════════════════════════════════
  // CONFIG
  // ═══════════════════════════════════════════════════════════════════════════

  const configCmd = program.command('config').description('Engine configuration');

  configCmd
    .command('show')
    .description('Print the effective configuration')
    .action(() => {
      const configPath = program.opts<{ config?: string }>().config;
      const config = resolveEngineConfig(io, configPath);
      if (config === null) return;
      io.out(`# ${configPath ?? getConfigPath()}\n`);
      io.out(JSON.stringify(config, null, 2) + '\n');
    });

  return program;
}
