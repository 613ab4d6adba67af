import { buildOpenApiDocument, createApp } from '../packages/api/src/app.js';
import { createInMemoryCredentialStore } from '../packages/core/src/credentials/credential-store.js';
import { UnexpectedError } from '../packages/shared/src/utils/errors.js';

const app = createApp({
  bridge: {
    callAdk: () => Promise.reject(new UnexpectedError('Not available while generating the API document')),
  },
  credentialStore: createInMemoryCredentialStore(),
  appName: 'openapi',
  version: '0.1.0',
});

const doc = buildOpenApiDocument(app, '0.1.0');

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
