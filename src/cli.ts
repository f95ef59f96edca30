#!/usr/bin/env node
import axios from 'axios';
import cac from 'cac';
import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as net from 'net';
import * as path from 'path';
import { CliPresenter } from './adapters/presenters/CliPresenter';
import { decodeLineTokens } from './domain/encoding';
import { DaemonInfo, getDaemonFilePath, parseDaemonInfo } from './utils/daemon';

interface OutputOptions {
  table?: boolean;
}

const cli = cac('semhl');
const presenter = new CliPresenter();

async function getDaemonInfo(): Promise<DaemonInfo | null> {
  try {
    const daemonFilePath = getDaemonFilePath(process.cwd());
    const content = await fs.readFile(daemonFilePath, 'utf-8');
    return parseDaemonInfo(content);
  } catch {
    return null;
  }
}

async function isServerRunning(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    socket.setTimeout(500);
    socket.on('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.on('timeout', () => {
      socket.destroy();
      resolve(false);
    });
    socket.on('error', () => {
      resolve(false);
    });
    socket.connect(port, '127.0.0.1');
  });
}

async function waitForServer(retries = 20, delay = 500): Promise<number> {
  for (let i = 0; i < retries; i++) {
    const info = await getDaemonInfo();
    if (info) {
      try {
        await axios.get(`http://localhost:${info.port}/health`);
        return info.port;
      } catch {
        // Server might be starting up
      }
    }
    await new Promise((r) => setTimeout(r, delay));
  }
  throw new Error('Server failed to start within timeout');
}

async function ensureServerRunning(): Promise<number> {
  const info = await getDaemonInfo();
  if (info) {
    if (await isServerRunning(info.port)) {
      return info.port;
    }
    // Stale file, remove it
    try {
      await fs.unlink(getDaemonFilePath(process.cwd()));
    } catch {
      // Ignore
    }
  }

  console.error('Server not running. Starting server...');

  const isTs = __filename.endsWith('.ts');
  const scriptPath = isTs
    ? path.join(__dirname, 'main.ts')
    : path.join(__dirname, 'main.js');

  const command = isTs ? 'npx' : 'node';
  const args = isTs ? ['ts-node', scriptPath] : [scriptPath];

  const child = spawn(command, args, {
    detached: true,
    stdio: 'ignore',
    cwd: process.cwd(),
  });

  child.unref();

  const port = await waitForServer();
  console.error(`Server started on port ${port}.`);
  return port;
}

function handleError(error: unknown) {
  if (axios.isAxiosError(error) && error.response) {
    console.error(`Error: ${error.response.status} - ${JSON.stringify(error.response.data)}`);
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Unknown error occurred');
  }
  process.exit(1);
}

// Wrap action to ensure server is running
const withServer =
  <A extends unknown[]>(action: (baseUrl: string, ...args: A) => Promise<void>) =>
  async (...args: A) => {
    try {
      const port = await ensureServerRunning();
      const baseUrl = `http://localhost:${port}`;
      await action(baseUrl, ...args);
    } catch (error) {
      handleError(error);
    }
  };

cli
  .command('tokens <tree>', 'List the highlighting tokens of a resolved tree')
  .option('--table', 'Output in table format')
  .action(
    withServer(async (baseUrl, tree: string, options: OutputOptions) => {
      const response = await axios.get(`${baseUrl}/tokens`, {
        params: { path: path.resolve(tree) },
      });
      presenter.present(response.data.tokens, options);
    }),
  );

cli
  .command('highlight <tree>', 'Highlight a document version and print the changed lines')
  .option('--uri <uri>', 'Document identity (defaults to the tree path)')
  .option('--doc-version <version>', 'Document version, must grow on every call', {
    default: Date.now(),
  })
  .option('--table', 'Output in table format')
  .action(
    withServer(
      async (
        baseUrl,
        tree: string,
        options: OutputOptions & { uri?: string; docVersion: number | string },
      ) => {
        const treePath = path.resolve(tree);
        const response = await axios.post(`${baseUrl}/highlight`, {
          uri: options.uri ?? treePath,
          version: Number(options.docVersion),
          path: treePath,
        });
        presenter.present(response.data, options);
      },
    ),
  );

cli.command('close <uri>', 'Forget the highlighting snapshot of a document').action(
  withServer(async (baseUrl, uri: string) => {
    const response = await axios.post(`${baseUrl}/close`, { uri });
    presenter.present(response.data, {});
  }),
);

cli
  .command('scopes', 'Print the kind to TextMate scope table')
  .option('--table', 'Output in table format')
  .action(
    withServer(async (baseUrl, options: OutputOptions) => {
      const response = await axios.get(`${baseUrl}/scopes`);
      presenter.present(response.data, options);
    }),
  );

cli
  .command('decode <payload>', 'Decode the base64 tokens of one highlighted line')
  .option('--table', 'Output in table format')
  .action((payload: string, options: OutputOptions) => {
    try {
      presenter.present(decodeLineTokens(payload), options);
    } catch (error) {
      handleError(error);
    }
  });

cli.command('stop', 'Stop the background server').action(async () => {
  try {
    const info = await getDaemonInfo();
    if (!info) {
      console.log('Server is not running (no daemon file).');
      return;
    }
    const baseUrl = `http://localhost:${info.port}`;
    await axios.post(`${baseUrl}/shutdown`, {});
    console.log('Server stopping...');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.log('Server is not running or failed to stop.', msg);
  }
});

cli.help();
cli.version('0.1.0');

cli.parse();
