/**
 * Notification Dispatcher
 *
 * Sends the run's decisions as an email, with the digest attached when one
 * was written. Failures are reported as results and logged; a failed send
 * never fails the run.
 *
 * @module notify/dispatcher
 */

import { getSecret } from '../config/index.js';
import { err, ok, type EmailConfig, type LogEntry, type Result } from '../schemas/index.js';
import { fileExists } from '../storage/atomic.js';
import { silentLogger, type EmailTransport, type Logger } from '../pipeline/types.js';
import { buildMessage } from './email.js';

// ============================================================================
// Constants
// ============================================================================

export const EMAIL_HEADING = 'Weekly paper triage report';
export const EMAIL_FOOTER = 'This email was generated automatically by the paper triage assistant.';

// ============================================================================
// Errors
// ============================================================================

/**
 * Why a digest email was not sent.
 *
 * - disabled / no-entries: nothing to do
 * - config: sender, recipients or password missing
 * - transport: the SMTP exchange failed
 */
export type SendErrorKind = 'disabled' | 'no-entries' | 'config' | 'transport';

export class SendError extends Error {
  constructor(
    message: string,
    public readonly kind: SendErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SendError';
  }
}

// ============================================================================
// Message Content
// ============================================================================

/**
 * Substitute `{count}` and `{date}` in the configured subject.
 */
export function formatSubject(template: string, count: number, now: Date): string {
  const date = now.toISOString().slice(0, 10);
  return template.replace(/\{count\}/g, String(count)).replace(/\{date\}/g, date);
}

/**
 * Email body: heading, one line per entry, footer.
 */
export function buildBodyLines(entries: readonly LogEntry[]): string[] {
  return [
    EMAIL_HEADING,
    '',
    ...entries.map((e) => `- ${e.title} - decision: ${e.decision} - file: ${e.path}`),
    '',
    EMAIL_FOOTER,
  ];
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Options for {@link dispatchDigest}.
 */
export interface DispatchOptions {
  email: Readonly<EmailConfig>;
  entries: readonly LogEntry[];
  /** Digest written this run, if any */
  digestPath: string | null;
  transport: EmailTransport;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  now?: Date;
}

/**
 * Send the run's digest email if email is enabled.
 */
export async function dispatchDigest(options: DispatchOptions): Promise<Result<void, SendError>> {
  const { email, entries } = options;
  const logger = options.logger ?? silentLogger;

  if (!email.enabled) {
    return err(new SendError('Email disabled', 'disabled'));
  }

  if (entries.length === 0) {
    logger.info('Email enabled but no triage actions were taken; skipping send.');
    return err(new SendError('No triage actions to report', 'no-entries'));
  }

  if (!email.sender.trim() || email.recipients.length === 0) {
    const error = new SendError("Email sending requires 'sender' and 'recipients' in config.", 'config');
    logger.error(error.message);
    return err(error);
  }

  let password: string | undefined;
  if (email.passwordEnv) {
    password = getSecret(email.passwordEnv, options.env);
    if (!password) {
      const error = new SendError(
        `Email password env var ${email.passwordEnv} is not set; skipping email send.`,
        'config'
      );
      logger.error(error.message);
      return err(error);
    }
  }

  const attachments: string[] = [];
  if (options.digestPath && (await fileExists(options.digestPath))) {
    attachments.push(options.digestPath);
  }

  const message = buildMessage({
    subject: formatSubject(email.subject, entries.length, options.now ?? new Date()),
    sender: email.sender,
    recipients: email.recipients,
    bodyLines: buildBodyLines(entries),
    attachments,
  });

  try {
    await options.transport(message, {
      host: email.smtpHost,
      port: email.smtpPort,
      useTls: email.useTls,
      username: email.username,
      password,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to send email digest: ${reason}`);
    return err(new SendError(`Failed to send email digest: ${reason}`, 'transport', { cause: error }));
  }

  logger.info(`Sent email digest to ${email.recipients.join(', ')}`);
  return ok(undefined);
}
