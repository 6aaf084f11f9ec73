import fsPromises from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance, LightMyRequestResponse } from 'fastify';
import type { FileView } from '@sharebox/shared';
import { buildApp } from '../app.js';
import type { Database } from '../db/index.js';
import { SESSION_COOKIE } from '../middleware/auth.js';
import { createTestDatabase } from './database.js';

export const TEST_PASSWORD = 'password123';

export interface TestApp {
  app: FastifyInstance;
  db: Database;
  close(): Promise<void>;
}

/** The full app on an in-process database and a throwaway blob directory. */
export async function createTestApp(): Promise<TestApp> {
  const database = await createTestDatabase();
  const root = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'sharebox-app-test-'));

  const app = await buildApp({
    db: database.db,
    storagePath: path.join(root, 'uploads'),
    logoPath: path.join(root, 'logos'),
    sessionSecret: 'test-secret',
    logger: false,
  });
  await app.ready();

  return {
    app,
    db: database.db,
    close: async () => {
      await app.close();
      await database.close();
      await fsPromises.rm(root, { recursive: true, force: true });
    },
  };
}

/** `name=value` for the session cookie a response set, ready for a Cookie header. */
export function sessionCookieFrom(response: LightMyRequestResponse): string {
  const header = response.headers['set-cookie'];
  const cookies = Array.isArray(header) ? header : [String(header ?? '')];
  const session = cookies.find((cookie) => cookie.startsWith(`${SESSION_COOKIE}=`));
  if (!session) {
    throw new Error('Response did not set a session cookie');
  }
  return session.split(';')[0] ?? session;
}

export interface TestUser {
  id: string;
  cookie: string;
}

export async function registerUser(app: FastifyInstance, username: string): Promise<TestUser> {
  const response = await app.inject({
    method: 'POST',
    url: '/auth/register',
    payload: { username, email: `${username}@example.com`, password: TEST_PASSWORD },
  });
  if (response.statusCode !== 201) {
    throw new Error(`Registering ${username} failed: ${response.body}`);
  }
  const body = response.json<{ data: { id: string } }>();
  return { id: body.data.id, cookie: sessionCookieFrom(response) };
}

export interface MultipartFilePart {
  field: string;
  filename: string;
  content: Buffer | string;
  contentType?: string;
}

const BOUNDARY = '----sharebox-test-boundary';

/**
 * A multipart/form-data body. Text fields are written before the file part,
 * which is the order request.file() needs to see them.
 */
export function multipartPayload(
  fields: Record<string, string>,
  file?: MultipartFilePart,
): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];

  for (const [name, value] of Object.entries(fields)) {
    chunks.push(
      Buffer.from(
        `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`,
      ),
    );
  }

  if (file) {
    chunks.push(
      Buffer.from(
        `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${file.field}"; filename="${file.filename}"\r\n` +
          `Content-Type: ${file.contentType ?? 'application/octet-stream'}\r\n\r\n`,
      ),
      Buffer.isBuffer(file.content) ? file.content : Buffer.from(file.content),
      Buffer.from('\r\n'),
    );
  }

  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

export interface UploadOptions {
  content?: string;
  isPublic?: boolean;
  transactionNumber?: string;
}

export async function uploadFile(
  app: FastifyInstance,
  user: TestUser,
  filename: string,
  options: UploadOptions = {},
): Promise<FileView> {
  const { payload, headers } = multipartPayload(
    {
      transactionNumber: options.transactionNumber ?? 'TX-1',
      isPublic: String(options.isPublic ?? false),
    },
    { field: 'file', filename, content: options.content ?? `contents of ${filename}` },
  );
  const response = await app.inject({
    method: 'POST',
    url: '/files',
    headers: { ...headers, cookie: user.cookie },
    payload,
  });
  if (response.statusCode !== 201) {
    throw new Error(`Uploading ${filename} failed: ${response.body}`);
  }
  return response.json<{ data: FileView }>().data;
}
