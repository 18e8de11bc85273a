import { createControlPlane } from '../bootstrap';
import { loadConfig } from '../config/loader';
import type { ControlPlaneConfig } from '../config/schema';
import { errorMessage, isUnitError } from '../unit/errors';
import { runServe } from './serve';
import { formatUnitCatalog } from './units';

interface CliArgs {
  command: string;
  config?: string;
  host?: string;
  port?: number;
}

function parseArgs(argv: string[]): CliArgs {
  const [command = 'help', ...rest] = argv;
  const result: CliArgs = { command };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const next = (): string => {
      const value = rest[++i];
      if (value === undefined) throw new Error(`${arg} needs a value`);
      return value;
    };
    if (arg === '--config') {
      result.config = next();
    } else if (arg === '--host') {
      result.host = next();
    } else if (arg === '--port') {
      const port = Number(next());
      if (!Number.isInteger(port) || port < 0 || port > 65_535) throw new Error(`invalid port: ${rest[i]}`);
      result.port = port;
    } else {
      throw new Error(`unknown option: ${arg}`);
    }
  }
  return result;
}

function printHelp(): void {
  console.log(`
aima control plane

Usage:
  aima serve [--config <file>] [--host <host>] [--port <port>]
  aima units [--config <file>]

Environment:
  AIMA_CONFIG, AIMA_DATA_DIR, AIMA_API_PORT, AIMA_API_KEYS, AIMA_HF_TOKEN,
  AIMA_HF_BASE_URL, AIMA_OLLAMA_BASE_URL, AIMA_DOWNLOAD_DIR, AIMA_LOG_FILE
`);
}

function withCliOverrides(config: ControlPlaneConfig, args: CliArgs): ControlPlaneConfig {
  return {
    ...config,
    api: {
      ...config.api,
      host: args.host ?? config.api.host,
      port: args.port ?? config.api.port,
    },
  };
}

async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  switch (args.command) {
    case 'serve': {
      const config = withCliOverrides(loadConfig({ file: args.config }), args);
      await runServe(config);
      return 0;
    }
    case 'units': {
      const config = loadConfig({ file: args.config });
      // Listing touches no store on disk.
      const plane = await createControlPlane({ ...config, model: { ...config.model, store: 'memory' } });
      try {
        console.log(formatUnitCatalog(plane.registry));
      } finally {
        plane.close();
      }
      return 0;
    }
    case 'help':
    case '--help':
    case '-h':
      printHelp();
      return 0;
    default:
      printHelp();
      return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const code = isUnitError(error) ? ` [${error.code}]` : '';
    console.error(`aima: ${errorMessage(error)}${code}`);
    process.exitCode = 1;
  });
