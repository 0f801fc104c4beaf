import chalk from 'chalk';
import { createGatewayServer } from '../../gateway/server.js';
import { loadConfig, ensureConfigDir, resolveConfig } from '../../config/index.js';
import { globalRegistry } from '../../plugins/sdk/registry.js';

interface ServeOptions {
  port?: string;
  host?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  console.log(chalk.cyan('\nStarting Conduit gateway...\n'));

  await ensureConfigDir();

  const config = resolveConfig(await loadConfig());
  if (options.port) {
    const port = Number.parseInt(options.port, 10);
    if (Number.isNaN(port)) {
      console.error(chalk.red(`Invalid port: ${options.port}`));
      process.exit(1);
    }
    config.server.port = port;
  }
  if (options.host) config.server.host = options.host;

  const server = createGatewayServer(config);
  await server.start();

  const plugins = globalRegistry.listPlugins();
  console.log(chalk.green(`\n✓ Gateway is ready with ${plugins.length} plugin(s)`));
  console.log(chalk.dim('Press Ctrl+C to stop\n'));

  const shutdown = async () => {
    console.log(chalk.yellow('\nShutting down...'));
    await server.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}
