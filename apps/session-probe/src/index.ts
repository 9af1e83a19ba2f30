#!/usr/bin/env node

/**
 * Session probe
 *
 * Connects to the API named by API_URL with the configured credential, sends
 * one GET and prints the status line. Logs go to stderr.
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import {
  createSessionBuilder,
  withMinimumLevel,
  type CredentialResult,
  type Log,
  type SessionBuilder,
} from 'auth-negotiation';
import { loadProbeConfig, type ProbeCredential } from './config.js';
import {
  EXIT_CODES,
  exitCodeForError,
  exitCodeForStatus,
  formatError,
  formatStatusLine,
  type ExitCode,
} from './outcome.js';

const stderrLog: Log = (level, message, data) => {
  if (data === undefined) {
    console.error(`[${level}] ${message}`);
  } else {
    console.error(`[${level}] ${message}`, JSON.stringify(data));
  }
};

const configure = (builder: SessionBuilder, credential: ProbeCredential): CredentialResult => {
  switch (credential.kind) {
    case 'anonymous':
      return builder.withAnonymous();
    case 'credentials':
      return builder.withCredentials(credential.username, credential.password, {
        domain: credential.domain,
      });
    case 'oidc':
      return builder.withOidc(credential.options);
    default: {
      const unsupported: never = credential;
      return unsupported;
    }
  }
};

async function main(): Promise<ExitCode> {
  const config = loadProbeConfig(process.env);
  if (config.isErr()) {
    console.error(formatError(config.error));
    return exitCodeForError(config.error);
  }

  const { apiUrl, apiPath, logLevel, requestTimeoutMs, proxyUrl, credential } = config.value;
  const builder = createSessionBuilder(apiUrl, {
    log: withMinimumLevel(stderrLog, logLevel),
    configuration: { requestTimeoutMs, proxyUrl },
  });

  const configured = configure(builder, credential);
  if (configured.isErr()) {
    console.error(formatError(configured.error));
    return exitCodeForError(configured.error);
  }

  const session = await configured.value.connect();
  if (session.isErr()) {
    console.error(formatError(session.error));
    return exitCodeForError(session.error);
  }

  const response = await session.value.request(apiPath);
  if (response.isErr()) {
    console.error(formatError(response.error));
    return exitCodeForError(response.error);
  }

  console.log(formatStatusLine(response.value));
  return exitCodeForStatus(response.value.status);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_CODES.session;
  }
);
