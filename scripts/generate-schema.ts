#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod schema the Normalizer validates against.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts [output-path]
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { NormalizedMessageSchema } from '../src/core/normalizer/Normalizer';

const scriptDir = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_OUTPUT = path.join(scriptDir, '../schema/normalized-message.schema.json');

function buildSchema(): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(NormalizedMessageSchema, {
    name: 'NormalizedMessage',
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });

  return {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'NormalizedMessage',
    description: 'Canonical record stored for each ingested chat or channel message',
    version: '1.0.0',
    ...jsonSchema,
    examples: [
      {
        messageId: '1700000000000',
        createdAt: '2024-01-15T10:30:00.000Z',
        teamId: 'team-1',
        channelId: '19:general@thread.tacv2',
        senderId: 'user-1',
        senderName: 'Example User',
        bodyText: 'Deploy finished',
        mentions: [],
        attachments: [],
        rawPayload: { id: '1700000000000' },
      },
    ],
  };
}

function generateSchema(outputPath: string): void {
  console.log('🔨 Generating JSON Schema from Zod...');

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, `${JSON.stringify(buildSchema(), null, 2)}\n`, 'utf-8');

  console.log(`✅ JSON Schema generated: ${outputPath}`);
}

try {
  generateSchema(process.argv[2] ?? DEFAULT_OUTPUT);
} catch (error: unknown) {
  console.error('❌ Failed to generate JSON Schema:', error instanceof Error ? error.message : error);
  process.exit(1);
}
