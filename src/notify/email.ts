/**
 * Email Transport
 *
 * Message assembly and SMTP delivery for the weekly digest email.
 *
 * @module notify/email
 */

import * as path from 'node:path';
import nodemailer from 'nodemailer';
import type { EmailMessage, EmailTransport } from '../pipeline/types.js';

/**
 * Input for {@link buildMessage}.
 */
export interface MessageParts {
  subject: string;
  sender: string;
  recipients: readonly string[];
  bodyLines: readonly string[];
  /** Files to attach; callers filter out files that no longer exist */
  attachments?: readonly string[];
}

/**
 * Content type for an attachment, by extension.
 */
export function attachmentContentType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.md' || ext === '.markdown' ? 'text/markdown' : 'text/plain';
}

/**
 * Assemble a plain-text message.
 */
export function buildMessage(parts: MessageParts): EmailMessage {
  return {
    subject: parts.subject,
    from: parts.sender,
    to: [...parts.recipients],
    text: parts.bodyLines.join('\n'),
    attachments: (parts.attachments ?? []).map((filePath) => ({
      filename: path.basename(filePath),
      path: filePath,
      contentType: attachmentContentType(filePath),
    })),
  };
}

/**
 * Deliver over SMTP with nodemailer.
 *
 * With `useTls` the connection must upgrade via STARTTLS. Login happens only
 * when both username and password are present.
 */
export const smtpTransport: EmailTransport = async (message, options) => {
  const auth =
    options.username && options.password
      ? { user: options.username, pass: options.password }
      : undefined;

  const transporter = nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: false,
    requireTLS: options.useTls,
    ignoreTLS: !options.useTls,
    auth,
  });

  try {
    await transporter.sendMail({
      from: message.from,
      to: message.to.join(', '),
      subject: message.subject,
      text: message.text,
      attachments: message.attachments,
    });
  } finally {
    transporter.close();
  }
};
