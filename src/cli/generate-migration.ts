#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { COLLECTION_NAME_REGEX, DEFAULT_STATE_FIELD } from '../state-persistence.constants';
import { assertCollectionName } from '../utils/assert-collection-name';

export function generateMigration(
  collection: string,
  stateField: string = DEFAULT_STATE_FIELD,
): string {
  assertCollectionName(collection);
  if (!COLLECTION_NAME_REGEX.test(stateField)) {
    throw new Error(
      `Invalid state field "${stateField}". Only alphanumeric characters and underscores are allowed.`,
    );
  }

  return `-- migrate:up
CREATE TABLE ${collection} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    document JSONB NOT NULL DEFAULT '{}'::jsonb,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${collection}_${stateField}
    ON ${collection} ((document ->> '${stateField}'));

CREATE INDEX idx_${collection}_document_gin
    ON ${collection} USING gin (document);

-- migrate:down
DROP TABLE IF EXISTS ${collection};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      'Usage: nestjs-state-persistence generate-migration <collection> [stateField]\n\n' +
        'Generates a dbmate-compatible SQL migration file for a state document collection.\n\n' +
        'Arguments:\n' +
        '  collection   The table holding the documents (alphanumeric and underscores only)\n' +
        `  stateField   Attribute holding the state. Default: ${DEFAULT_STATE_FIELD}\n\n` +
        'Example:\n' +
        '  npx nestjs-state-persistence generate-migration orders status',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const collection = args[1];
  if (!collection) {
    console.error('Error: collection argument is required.');
    console.error(
      'Usage: nestjs-state-persistence generate-migration <collection> [stateField]',
    );
    process.exit(1);
  }

  const sql = generateMigration(collection, args[2]);

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${collection}.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
