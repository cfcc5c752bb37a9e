#!/usr/bin/env node
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { describeCommand, execCommand } from './cli/commands.js';
import { errorMessage, isDatabaseError } from './errors/errors.js';
import { cliLogger, setLogLevel } from './utils/logger.js';

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('sqlweave')
    .option('db', { type: 'string', desc: 'SQLite database file (default: SQLWEAVE_DATABASE or :memory:)' })
    .option('log-level', { type: 'string', desc: 'winston log level' })
    .middleware((argv) => {
      if (argv.logLevel) setLogLevel(argv.logLevel);
    })
    .command(
      'exec <sql>',
      'Run one SQL statement and print the rows as JSON',
      (y) =>
        y
          .positional('sql', { type: 'string', demandOption: true })
          .option('params', { type: 'string', desc: 'JSON array of positional parameters' })
          .option('explain', { type: 'boolean', default: false, desc: 'Print the query plan instead of rows' }),
      async (argv) => {
        console.log(await execCommand({ sql: argv.sql, db: argv.db, params: argv.params, explain: argv.explain }));
      },
    )
    .command(
      'describe <table>',
      'Print the column types of a table',
      (y) => y.positional('table', { type: 'string', demandOption: true }),
      async (argv) => {
        console.log(await describeCommand({ table: argv.table, db: argv.db }));
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parse();
}

main().catch((e) => {
  cliLogger.debug('Command failed', { kind: isDatabaseError(e) ? e.kind : 'unexpected' });
  console.error(errorMessage(e));
  process.exit(1);
});
