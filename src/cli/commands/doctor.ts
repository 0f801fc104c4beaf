import chalk from 'chalk';
import { access } from 'node:fs/promises';
import { constants } from 'node:fs';
import { CONDUIT_DIR, CONFIG_FILE, loadConfig, resolveConfig } from '../../config/index.js';
import { errorMessage } from '../../errors/index.js';
import type { ConduitConfig } from '../../types/index.js';

export interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
}

/**
 * Checks that need only the loaded config, no filesystem or network.
 */
export function configChecks(config: ConduitConfig): Check[] {
  const checks: Check[] = [];

  const publicUrl = config.server.publicUrl;
  checks.push(
    publicUrl
      ? { name: 'Public URL', status: 'pass', message: publicUrl }
      : {
          name: 'Public URL',
          status: 'warn',
          message: `Not set; vendors will be pointed at http://${config.server.host}:${config.server.port}`,
        }
  );

  const clients = Object.entries(config.oauth ?? {});
  const incomplete = clients.filter(([, client]) => !client.clientSecret).map(([name]) => name);
  checks.push({
    name: 'OAuth clients',
    status: clients.length === 0 || incomplete.length > 0 ? 'warn' : 'pass',
    message:
      clients.length === 0
        ? 'None configured'
        : incomplete.length > 0
          ? `Missing clientSecret: ${incomplete.join(', ')}`
          : clients.map(([name]) => name).join(', '),
  });

  if (config.wecom) {
    const { token, encodingAesKey, receiveId } = config.wecom;
    const missing = Object.entries({ token, encodingAesKey, receiveId })
      .filter(([, value]) => !value)
      .map(([key]) => key);
    checks.push({
      name: 'WeCom callback',
      status: missing.length === 0 ? 'pass' : 'fail',
      message: missing.length === 0 ? 'Configured' : `Missing ${missing.join(', ')}`,
    });
    checks.push({
      name: 'WeCom reply model',
      status: config.model ? 'pass' : 'warn',
      message: config.model ? `${config.model.model} at ${config.model.baseUrl}` : 'Not set; replies will fail',
    });
  }

  return checks;
}

export async function doctorCommand(): Promise<void> {
  console.log(chalk.cyan('\nConduit Doctor\n'));

  const checks: Check[] = [];

  const nodeMajor = Number.parseInt(process.versions.node.split('.')[0] ?? '0', 10);
  checks.push({
    name: 'Node.js version',
    status: nodeMajor >= 20 ? 'pass' : 'fail',
    message: nodeMajor >= 20 ? `v${process.versions.node}` : `v${process.versions.node} (v20+ required)`,
  });

  checks.push(await checkPath('Config directory', CONDUIT_DIR));

  try {
    const config = resolveConfig(await loadConfig());
    checks.push({ name: 'Config file', status: 'pass', message: CONFIG_FILE });
    checks.push(await checkPath('Plugins directory', config.pluginsDir));
    checks.push(...configChecks(config));
  } catch (err) {
    checks.push({ name: 'Config file', status: 'fail', message: errorMessage(err) });
  }

  for (const check of checks) {
    const icon = check.status === 'pass' ? chalk.green('✓') : check.status === 'warn' ? chalk.yellow('⚠') : chalk.red('✗');
    const color = check.status === 'pass' ? chalk.green : check.status === 'warn' ? chalk.yellow : chalk.red;

    console.log(`  ${icon} ${chalk.bold(check.name)}`);
    console.log(`    ${color(check.message)}\n`);
  }

  const failed = checks.filter((c) => c.status === 'fail').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  console.log(chalk.dim('─'.repeat(40)));

  if (failed > 0) {
    console.log(chalk.red(`\n✗ ${failed} issue(s) need attention\n`));
    process.exit(1);
  } else if (warned > 0) {
    console.log(chalk.yellow(`\n⚠ ${warned} warning(s)\n`));
  } else {
    console.log(chalk.green(`\n✓ All ${checks.length} checks passed\n`));
  }
}

async function checkPath(name: string, path: string): Promise<Check> {
  try {
    await access(path, constants.R_OK);
    return { name, status: 'pass', message: path };
  } catch {
    return { name, status: 'warn', message: `Not found: ${path}` };
  }
}
