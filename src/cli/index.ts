import { Command } from 'commander';
import { SEAT_PREFERENCES } from '../automation/types.js';
import { deleteCredentialCommand, listCredentialsCommand, setCredentialCommand } from './commands/credentials.js';
import { ReserveCliOptions, reserveCommand } from './commands/reserve.js';
import { clearSessionCommand } from './commands/session.js';
import { stationsCommand } from './commands/stations.js';
import {
  collectTrainNumber,
  parseDate,
  parseHour,
  parseMaxAttempts,
  parsePassengers,
  parseSeat,
} from './validation.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('rail-seat-bot')
    .description('Watch for seats on a train and reserve one as soon as it frees up')
    .version('0.1.0');

  program
    .command('reserve', { isDefault: true })
    .description('Search repeatedly and reserve the first available seat')
    .option('-d, --departure <station>', 'Departure station')
    .option('-a, --arrival <station>', 'Arrival station')
    .option('--date <YYYYMMDD>', 'Departure date (default: today)', parseDate)
    .option('-t, --time <HH>', 'Earliest departure hour (default: now)', parseHour)
    .option('-s, --seat <class>', `Seat class (${SEAT_PREFERENCES.join(', ')})`, parseSeat, 'general')
    .option('--train <no>', 'Only consider this train number (repeatable)', collectTrainNumber)
    .option('-p, --passengers <n>', 'Number of adult passengers', parsePassengers, 1)
    .option('--headless', 'Run the browser headless after login', true)
    .option('--no-headless', 'Keep the browser visible')
    .option('--interactive', 'Prompt for conditions and target trains (default when stdin is a TTY)')
    .option('--no-interactive', 'Never prompt')
    .option('--max-attempts <n>', 'Search cycles before giving up, 0 for no limit', parseMaxAttempts, 0)
    .option('--auto-pay', 'Pay with the stored card once reserved', false)
    .option('--notify', 'Send a Telegram message with the result', false)
    .action(async (_options: unknown, command: Command) => {
      process.exitCode = await reserveCommand(command.opts<ReserveCliOptions>());
    });

  const credentials = program.command('credentials').description('Manage encrypted credentials');

  credentials
    .command('set <namespace> <field>')
    .description('Store a value (e.g. card number, telegram token)')
    .action(setCredentialCommand);

  credentials
    .command('delete <namespace> <field>')
    .description('Remove a stored value')
    .action(deleteCredentialCommand);

  credentials
    .command('list')
    .description('Show stored namespaces and field names')
    .action(listCredentialsCommand);

  program
    .command('session')
    .description('Manage the saved login session')
    .command('clear')
    .description('Delete the saved session so the next run logs in again')
    .action(clearSessionCommand);

  program.command('stations').description('List known station names').action(stationsCommand);

  return program;
}
