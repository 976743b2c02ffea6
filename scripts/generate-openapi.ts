import { createApp } from '../packages/api/src/app.js';
import type { QueryProcessor } from '../packages/core/src/queries/query-processor.js';
import type { DescriptionLookup } from '../packages/core/src/registry/description-lookup.js';

const unused = (): never => {
  throw new Error('Not available while generating the OpenAPI document');
};

const queryProcessor: QueryProcessor = { process: unused };
const descriptionLookup: DescriptionLookup = { personTitle: unused, entityDefinition: unused };

const app = createApp({ version: '0.1.0', queryProcessor, descriptionLookup });

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Spurn API',
    version: '0.1.0',
    description: 'Question answering over a corpus of parsed Icelandic news articles',
  },
  servers: [
    { url: 'http://localhost:3000', description: 'Local development' },
  ],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
