import { Command } from 'commander';
import { loadConfigFile } from '../config/loader.js';
import { ConfigurationError } from '../errors/index.js';
import { TradeStationClient } from '../client/tradestation-client.js';
import { consumeStream } from '../client/stream-handlers.js';
import { buildBarsParams, buildStreamBarsParams } from '../client/params.js';
import type { BarUnit, BarsQuery, ClientOptions, StreamBarsQuery, StreamMessage } from '../types/index.js';

interface GlobalOptions {
  config?: string;
  live?: boolean;
  port?: string;
}

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Not an integer: ${value}`);
  }
  return parsed;
}

function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Not a date: ${value}`);
  }
  return date;
}

/**
 * Turn CLI flags into client options; flags win over the config file
 */
export function toClientOptions(options: GlobalOptions): ClientOptions {
  const fromFile = options.config ? loadConfigFile(options.config) : {};
  return {
    ...fromFile,
    demo: options.live ? false : fromFile.demo,
    port: options.port !== undefined ? parseInteger(options.port) : fromFile.port,
  };
}

/**
 * Log in, run one command against the client, then release it
 */
async function withClient(program: Command, run: (client: TradeStationClient) => Promise<void>): Promise<void> {
  const client = await TradeStationClient.create(toClientOptions(program.opts<GlobalOptions>()));
  try {
    await run(client);
  } finally {
    client.close();
  }
}

async function printStream(stream: AsyncIterable<StreamMessage>): Promise<void> {
  await consumeStream(stream, {
    onData: printJson,
    onStatus: printJson,
    onDeleted: printJson,
  });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tradestation')
    .description('Brokerage REST and streaming client')
    .version('1.0.0')
    .option('-c, --config <path>', 'Path to a YAML configuration file')
    .option('--live', 'Use the live environment instead of the simulator')
    .option('-p, --port <port>', 'Local port for the OAuth redirect listener');

  program
    .command('accounts')
    .description('List brokerage accounts')
    .action(() => withClient(program, async (client) => printJson(await client.getAccounts())));

  program
    .command('balances <accounts...>')
    .description('Show balances for one or more accounts')
    .action((accounts: string[]) =>
      withClient(program, async (client) => printJson(await client.getBalances(accounts)))
    );

  program
    .command('positions <accounts...>')
    .description('Show positions for one or more accounts')
    .option('-s, --symbol <symbols...>', 'Only these symbols')
    .action((accounts: string[], options: { symbol?: string[] }) =>
      withClient(program, async (client) => printJson(await client.getPositions(accounts, options.symbol)))
    );

  program
    .command('orders <accounts...>')
    .description("Show today's and open orders")
    .action((accounts: string[]) =>
      withClient(program, async (client) => printJson(await client.getOrders(accounts)))
    );

  program
    .command('bars <symbol>')
    .description('Fetch historical bars')
    .option('-u, --unit <unit>', 'Minute, Daily, Weekly or Monthly', 'Daily')
    .option('-i, --interval <n>', 'Bar interval', '1')
    .option('-b, --bars-back <n>', 'Number of bars')
    .option('--first-date <date>', 'First bar date (ISO-8601)')
    .option('--last-date <date>', 'Last bar date (ISO-8601)')
    .action(
      (
        symbol: string,
        options: { unit: BarUnit; interval: string; barsBack?: string; firstDate?: string; lastDate?: string }
      ) => {
        // Bad flags fail here, before the login
        const query: BarsQuery = {
          unit: options.unit,
          interval: parseInteger(options.interval),
          barsBack: options.barsBack !== undefined ? parseInteger(options.barsBack) : undefined,
          firstDate: options.firstDate ? parseDate(options.firstDate) : undefined,
          lastDate: options.lastDate ? parseDate(options.lastDate) : undefined,
        };
        buildBarsParams(query);
        return withClient(program, async (client) => printJson(await client.getBars(symbol, query)));
      }
    );

  program
    .command('stream-bars <symbol>')
    .description('Stream bars as they form')
    .option('-u, --unit <unit>', 'Minute, Daily, Weekly or Monthly', 'Minute')
    .option('-i, --interval <n>', 'Bar interval', '1')
    .option('-b, --bars-back <n>', 'Number of historical bars to start with')
    .action((symbol: string, options: { unit: BarUnit; interval: string; barsBack?: string }) => {
      const query: StreamBarsQuery = {
        unit: options.unit,
        interval: parseInteger(options.interval),
        barsBack: options.barsBack !== undefined ? parseInteger(options.barsBack) : undefined,
      };
      buildStreamBarsParams(query);
      return withClient(program, (client) => printStream(client.streamBars(symbol, query)));
    });

  program
    .command('stream-orders <accounts...>')
    .description('Stream order updates')
    .action((accounts: string[]) => withClient(program, (client) => printStream(client.streamOrders(accounts))));

  program
    .command('stream-positions <accounts...>')
    .description('Stream position updates')
    .option('--changes', 'Only send changes after the initial snapshot')
    .action((accounts: string[], options: { changes?: boolean }) =>
      withClient(program, (client) =>
        printStream(client.streamPositions(accounts, { changes: options.changes ?? false }))
      )
    );

  return program;
}
