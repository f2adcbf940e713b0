/**
 * Print the route table for a declarations file
 *
 * Usage: npx tsx scripts/print-routes.ts config/activity-routes.example.json [--subscriptions=users,admins]
 *
 * Options:
 *   --subscriptions   Targets that enable subscriptions (for `withSubscription` cascading)
 */

import { config } from '@dotenvx/dotenvx';
config();

import { readFile } from 'node:fs/promises';
import { consola } from 'consola';
import { createActivityApp } from '../src/app';
import { initializeLogging } from '../src/shared/logging/config';

const parseArgs = (): { file: string | undefined; subscriptions: string[] } => {
  const args = process.argv.slice(2);
  const subscriptions = args.find((arg) => arg.startsWith('--subscriptions='))?.split('=')[1] ?? '';

  return {
    file: args.find((arg) => !arg.startsWith('--')),
    subscriptions: subscriptions.split(',').filter((name) => name !== ''),
  };
};

const main = async (): Promise<void> => {
  const { file, subscriptions } = parseArgs();

  if (!file) {
    consola.error('Usage: tsx scripts/print-routes.ts <declarations.json> [--subscriptions=users,admins]');
    process.exitCode = 1;
    return;
  }

  await initializeLogging();

  const declarations: unknown = JSON.parse(await readFile(file, 'utf8'));
  const { routeSet } = createActivityApp({
    declarations,
    targets: subscriptions.map((resourceName) => ({ resourceName, subscriptionEnabled: () => true })),
  });

  consola.info(`${routeSet.routes.length} routes declared from ${file}`);
  consola.log(routeSet.format());
};

main().catch((error: unknown) => {
  consola.error('Failed to print routes:', error);
  process.exitCode = 1;
});
