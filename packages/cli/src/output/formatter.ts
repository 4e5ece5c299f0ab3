import type { User } from '@tally/shared';

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatUserCreated(user: User): string {
  return [
    'User created:',
    `  ID:       ${user.id}`,
    `  Username: ${user.username}`,
  ].join('\n');
}

export function formatUserStatus(user: User): string {
  return `User "${user.username}" ${user.disabled ? 'disabled' : 'enabled'}.`;
}

export function formatUserTable(users: User[]): string {
  if (users.length === 0) {
    return 'No users found.';
  }

  const lines = [
    `${'ID'.padEnd(6)} ${'Username'.padEnd(20)} ${'Status'.padEnd(10)} Created`,
    '-'.repeat(64),
  ];
  for (const user of users) {
    const status = user.disabled ? 'disabled' : 'active';
    lines.push(`${String(user.id).padEnd(6)} ${user.username.padEnd(20)} ${status.padEnd(10)} ${user.createdAt}`);
  }
  return lines.join('\n');
}
