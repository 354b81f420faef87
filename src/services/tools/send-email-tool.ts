// Send Email Tool
// Delivers a message through the mail relay; never safe to repeat blindly

import type { NotificationTool, ToolResult } from './types.js';
import { FailureKind } from './types.js';
import { MailDeliveryError } from '../mailer.js';
import type { Mailer } from '../mailer.js';
import { fail, invalidParameter, readString } from './failures.js';

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function createSendEmailTool(mailer: Mailer): NotificationTool {
  return {
    name: 'send_email',
    description: 'Send an email to a colleague.',
    kind: 'notification',
    category: 'action',
    effect: 'mutating',
    parameters: [
      {
        name: 'to_email',
        type: 'string',
        description: 'Recipient address',
        required: true,
        imports: 'email',
        target: true,
      },
      { name: 'subject', type: 'string', description: 'Subject line', required: true },
      { name: 'body', type: 'string', description: 'Message body', required: true, imports: 'draft_body' },
      { name: 'cc', type: 'string', description: 'Copy address', required: false },
    ],
    exports: ['message_id'],
    invoke: async (args, { signal }): Promise<ToolResult> => {
      const to = readString(args, 'to_email');
      if (!to || !EMAIL.test(to)) return invalidParameter('to_email', `"${to ?? ''}" is not an email address`);
      const subject = readString(args, 'subject');
      if (!subject) return invalidParameter('subject', 'subject is required');
      const body = readString(args, 'body');
      if (!body) return invalidParameter('body', 'body is required');
      const cc = readString(args, 'cc');
      if (cc && !EMAIL.test(cc)) return invalidParameter('cc', `"${cc}" is not an email address`);

      try {
        const receipt = await mailer.send({ to, subject, body, ...(cc ? { cc } : {}) }, signal);
        const content = `Sent "${subject}" to ${to}${cc ? ` (cc ${cc})` : ''}`;
        return {
          success: true,
          content,
          data: { to, cc, subject, messageId: receipt.messageId },
          exports: { message_id: receipt.messageId },
          source: { origin: `mail:${receipt.messageId}`, excerpt: content },
        };
      } catch (error) {
        if (!(error instanceof MailDeliveryError)) throw error;
        // A 4xx means the relay refused the message outright
        if (error.status !== undefined && error.status >= 400 && error.status < 500) {
          return fail(FailureKind.PARAMETER_INVALID, error.message, { status: error.status });
        }
        return fail(FailureKind.EXTERNAL_MUTATION_UNCERTAIN, error.message, { to_email: to });
      }
    },
  };
}
