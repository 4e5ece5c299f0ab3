import { Command } from 'commander';
import {
  type User,
  DEFAULT_CONFIG,
  DuplicateUsernameError,
  NotFoundError,
  isoNow,
  parseOrThrow,
  registerRequestSchema,
} from '@tally/shared';
import { initializeStore, type TallyStore } from '@tally/store';
import { scryptHasher, type PasswordHasher } from '@tally/server';
import {
  formatError,
  formatUserCreated,
  formatUserStatus,
  formatUserTable,
} from '../output/formatter.js';

type UserStore = Pick<TallyStore, 'users'>;

export function resolveDatabasePath(flag?: string, env: NodeJS.ProcessEnv = process.env): string {
  return flag ?? env.TALLY_DB_PATH ?? DEFAULT_CONFIG.database.path;
}

/** Same rules as `POST /users/register`. */
export function createUser(
  store: UserStore,
  username: string,
  password: string,
  hasher: PasswordHasher = scryptHasher,
): User {
  const input = parseOrThrow(registerRequestSchema, { username, password }, 'body');
  const user = store.users.create(input.username, hasher.hash(input.password), isoNow());
  if (!user) {
    throw new DuplicateUsernameError(input.username);
  }
  return user;
}

export function setUserDisabled(store: UserStore, username: string, disabled: boolean): User {
  const user = store.users.getByUsername(username);
  const updated = user ? store.users.setDisabled(user.id, disabled) : null;
  if (!updated) {
    throw new NotFoundError('User');
  }
  return updated;
}

function withStore(dbPath: string | undefined, fn: (store: TallyStore) => void): void {
  let store: TallyStore | undefined;
  try {
    store = initializeStore(resolveDatabasePath(dbPath));
    fn(store);
  } catch (err) {
    console.error(`Error: ${formatError(err)}`);
    process.exitCode = 1;
  } finally {
    store?.close();
  }
}

interface StoreOptions {
  db?: string;
}

interface UsernameOptions extends StoreOptions {
  username: string;
}

interface CreateOptions extends UsernameOptions {
  password: string;
}

const DB_OPTION_HELP = 'SQLite database path (default: $TALLY_DB_PATH or .tally/tally.db)';

export const usersCommand = new Command('users')
  .description('Manage Tally users');

usersCommand
  .command('create')
  .description('Create a new user')
  .requiredOption('-u, --username <username>', 'Username')
  .requiredOption('-p, --password <password>', 'Password')
  .option('--db <path>', DB_OPTION_HELP)
  .action((options: CreateOptions) => {
    withStore(options.db, (store) => {
      console.log(formatUserCreated(createUser(store, options.username, options.password)));
    });
  });

usersCommand
  .command('list')
  .description('List all users')
  .option('--db <path>', DB_OPTION_HELP)
  .action((options: StoreOptions) => {
    withStore(options.db, (store) => {
      console.log(formatUserTable(store.users.list()));
    });
  });

usersCommand
  .command('disable')
  .description('Disable a user; their tokens stop resolving')
  .requiredOption('-u, --username <username>', 'Username')
  .option('--db <path>', DB_OPTION_HELP)
  .action((options: UsernameOptions) => {
    withStore(options.db, (store) => {
      console.log(formatUserStatus(setUserDisabled(store, options.username, true)));
    });
  });

usersCommand
  .command('enable')
  .description('Re-enable a disabled user')
  .requiredOption('-u, --username <username>', 'Username')
  .option('--db <path>', DB_OPTION_HELP)
  .action((options: UsernameOptions) => {
    withStore(options.db, (store) => {
      console.log(formatUserStatus(setUserDisabled(store, options.username, false)));
    });
  });
