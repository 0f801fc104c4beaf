#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { serveCommand } from './commands/serve.js';
import { doctorCommand } from './commands/doctor.js';
import { pluginsCommand } from './commands/plugins.js';
import { signCommand, SIGNING_VENDORS } from './commands/sign.js';
import { VERSION } from '../gateway/app.js';

const program = new Command();

const banner = `
${chalk.cyan('╭───────────────────────────────────────╮')}
${chalk.cyan('│')}  ${chalk.bold.white('Conduit')}                              ${chalk.cyan('│')}
${chalk.cyan('│')}  ${chalk.dim('Webhooks, OAuth and tools for hosts')}  ${chalk.cyan('│')}
${chalk.cyan('╰───────────────────────────────────────╯')}
`;

program
  .name('conduit')
  .description('Vendor webhook, OAuth, tool and model adapters behind one gateway')
  .version(VERSION)
  .addHelpText('before', banner);

program
  .command('serve')
  .description('Start the gateway server')
  .option('-p, --port <port>', 'Port to listen on (overrides config)')
  .option('-h, --host <host>', 'Host to bind to (overrides config)')
  .action(serveCommand);

program
  .command('doctor')
  .description('Diagnose configuration issues')
  .action(doctorCommand);

program
  .command('plugins')
  .description('List built-in plugins with their actions, triggers and events')
  .action(pluginsCommand);

program
  .command('sign <vendor>')
  .description(`Print the signature headers a vendor would send (${SIGNING_VENDORS.join(', ')})`)
  .requiredOption('--secret <secret>', 'Signing secret')
  .requiredOption('--file <path>', 'File holding the raw request body')
  .option('--timestamp <timestamp>', 'Timestamp to sign (zendesk)')
  .option('--url <url>', 'Full webhook URL (twilio)')
  .action(signCommand);

await program.parseAsync();
