#!/usr/bin/env node
import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createInterface } from 'readline/promises';
import { loadConfig, loadDatabaseConfig, loadLoggingConfig } from './config/index.js';
import { createQueryAssistant } from './context.js';
import { EXAMPLE_QUESTIONS } from './examples.js';
import { ensureDatabase, resetDatabase } from './fixtures/bootstrap.js';
import type { SeedSummary } from './fixtures/seed.js';
import type { QueryAssistant } from './QueryAssistant.js';
import { formatTurn } from './report/present.js';
import { renderSchemaCatalog } from './schema/catalog.js';
import { compareWithCatalog, SchemaIntrospector } from './schema/introspect.js';
import { createApp, startServer } from './server/app.js';
import { SqliteStore } from './sqlite/db.js';
import { configureLogging } from './utils/logger.js';

function printSeedSummary(summary: SeedSummary) {
  console.log(
    `Seeded ${summary.customers} customers, ${summary.agents} agents, ${summary.policies} policies, ` +
      `${summary.claims} claims and ${summary.prospects} prospects.`,
  );
}

function printExamples() {
  console.log('Example questions:');
  EXAMPLE_QUESTIONS.forEach((q, i) => console.log(`  ${i + 1}. ${q}`));
}

async function chat(assistant: QueryAssistant) {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log(`Ask about customers, policies, claims, agents and prospects (${assistant.provider}).`);
  console.log('Commands: /examples, /history, /reset, /quit');

  try {
    for (;;) {
      const line = (await rl.question('\n> ')).trim();
      if (!line) continue;

      if (line === '/quit' || line === '/exit') break;
      if (line === '/examples') {
        printExamples();
        continue;
      }
      if (line === '/history') {
        for (const message of assistant.history()) {
          console.log(`[${message.at.toISOString()}] ${message.role}: ${message.content}`);
        }
        continue;
      }
      if (line === '/reset') {
        printSeedSummary(await assistant.reset());
        continue;
      }

      console.log(formatTurn(await assistant.ask(line)));
    }
  } finally {
    rl.close();
  }
}

async function main() {
  dotenv.config();
  configureLogging(loadLoggingConfig());

  await yargs(hideBin(process.argv))
    .scriptName('insurance-nl2sql')
    .command(
      'ask <question>',
      'Translate one question to SQL and run it',
      (y) => y.positional('question', { type: 'string', demandOption: true, desc: 'Natural language question' }),
      async (argv) => {
        const assistant = createQueryAssistant(loadConfig());
        const seeded = await assistant.ensureReady();
        if (seeded) printSeedSummary(seeded);
        const turn = await assistant.ask(argv.question);
        console.log(formatTurn(turn));
        if (turn.status === 'failed') process.exitCode = 1;
      },
    )
    .command(
      'chat',
      'Interactive question loop',
      (y) => y,
      async () => {
        const assistant = createQueryAssistant(loadConfig());
        const seeded = await assistant.ensureReady();
        if (seeded) printSeedSummary(seeded);
        await chat(assistant);
      },
    )
    .command(
      'reset',
      'Drop every table and reseed with sample data',
      (y) => y.option('size', { type: 'number', desc: 'Number of addresses to generate (at least 5)' }),
      async (argv) => {
        const database = loadDatabaseConfig();
        const summary = await resetDatabase(new SqliteStore(database.path), argv.size ?? database.seedSize);
        printSeedSummary(summary);
      },
    )
    .command(
      'schema',
      'Print the schema catalog given to the model',
      (y) => y.option('check', { type: 'boolean', default: false, desc: 'Compare the catalog with the live database' }),
      async (argv) => {
        console.log(renderSchemaCatalog());
        if (!argv.check) return;

        const database = loadDatabaseConfig();
        const store = new SqliteStore(database.path);
        await ensureDatabase(store, database.seedSize);
        const live = await store.withConnection((connection) => new SchemaIntrospector(connection).getSchema());
        const problems = compareWithCatalog(live);

        console.log('');
        if (problems.length === 0) {
          console.log(`Database ${database.path} matches the catalog.`);
          return;
        }
        console.log(`Database ${database.path} differs from the catalog:`);
        problems.forEach((p) => console.log(`  - ${p}`));
        process.exitCode = 1;
      },
    )
    .command('examples', 'List example questions', (y) => y, () => printExamples())
    .command(
      'serve',
      'Start the HTTP API',
      (y) => y.option('port', { type: 'number', desc: 'Port to listen on (defaults to PORT)' }),
      async (argv) => {
        const config = loadConfig();
        const assistant = createQueryAssistant(config);
        await assistant.ensureReady();
        const app = createApp(assistant, config.server);
        const port = argv.port ?? config.server.port;
        await startServer(app, port);
        console.log(`Server running on http://localhost:${port}`);
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .fail((msg, err, y) => {
      if (err) throw err;
      y.showHelp();
      throw new Error(msg);
    })
    .parseAsync();
}

main().catch((e: unknown) => {
  // ConfigurationError messages already list every invalid variable
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
