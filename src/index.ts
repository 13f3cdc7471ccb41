#!/usr/bin/env node
/**
 * Sprint Work Items Proxy
 * Main entry point: loads configuration once and starts the HTTP server
 */

import * as dotenv from 'dotenv';
import { createProxyServer } from './server.js';
import { ConfigLoader } from './utils/config-loader.js';
import { ProxyConfig } from './types/index.js';

export interface CliOptions {
  port?: number;
  host?: string;
}

/**
 * Parse command-line arguments; flags override the environment.
 */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--port': {
        const port = parseInt(argv[i + 1], 10);
        if (isNaN(port) || port < 1 || port > 65535) {
          console.error(`Invalid port: ${argv[i + 1]}`);
          process.exit(1);
        }
        options.port = port;
        i++;
        break;
      }
      case '--host':
        options.host = argv[i + 1];
        i++;
        break;
      case '--help':
      case '-h':
        console.log(`
Sprint Work Items Proxy

Usage: sprint-workitems-proxy [options]

Options:
  --port <number>    HTTP port to listen on (default: $PORT or 8001)
  --host <address>   HTTP host to bind to (default: $HOST or 127.0.0.1)
  -h, --help         Show this help message

Environment:
  AZURE_ORG, AZURE_PROJECT (required), AZURE_TEAM, AZURE_DEVOPS_URL,
  AZURE_REQUEST_TIMEOUT_MS, HOST, PORT, DEBUG. A .env file is read if present.
`);
        process.exit(0);
    }
  }

  return options;
}

function withCliOverrides(config: ProxyConfig, options: CliOptions): ProxyConfig {
  return Object.freeze({
    ...config,
    server: Object.freeze({
      host: options.host ?? config.server.host,
      port: options.port ?? config.server.port,
    }),
  });
}

async function main(): Promise<void> {
  dotenv.config();
  const config = withCliOverrides(ConfigLoader.loadConfig(process.env), parseArgs(process.argv.slice(2)));
  const { host, port } = config.server;

  const httpServer = createProxyServer({ config });

  const shutdown = () => {
    console.error('\nShutting down...');
    httpServer.close((error) => {
      if (error) {
        console.error('[ERROR] Failed to close server:', error.message);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  console.error(`[INFO] Sprint work items proxy listening on http://${host}:${port}`);
  if (config.azure) {
    console.error(`[INFO] Azure DevOps: ${config.azure.organizationUrl} / ${config.azure.project} (team: ${config.azure.team})`);
  } else {
    console.error('[WARNING] AZURE_ORG and AZURE_PROJECT are not both set; data endpoints will answer 500');
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Failed to start server:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
