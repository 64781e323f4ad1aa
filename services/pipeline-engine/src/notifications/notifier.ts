import type { NotificationEvent } from '@telco-churn/shared';
import nodemailer, { type Transporter } from 'nodemailer';
import { z } from 'zod';

import { NotificationDispatchFailedError, toErrorMessage } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import type { SecretRedactor } from '../credentials/redactor.js';
import { notificationCounter } from '../monitoring/metrics.js';
import { renderNotification, type RenderedNotification } from './render.js';

export interface OutgoingMessage extends RenderedNotification {
  recipients: string[];
}

export interface NotificationTransport {
  send(message: OutgoingMessage): Promise<void>;
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  fromEmail?: string | undefined;
  fromName?: string | undefined;
}

export class SmtpTransport implements NotificationTransport {
  private readonly transporter: Transporter;

  private readonly fromAddress: string;

  constructor(config: SmtpConfig & { fromEmail: string }) {
    this.fromAddress = config.fromName ? `"${config.fromName}" <${config.fromEmail}>` : config.fromEmail;
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      ...(config.user
        ? {
            auth: {
              user: config.user,
              pass: config.pass,
            },
          }
        : {}),
    });
  }

  /** Null when SMTP is not configured; notifications are then skipped. */
  static fromConfig(config: SmtpConfig): SmtpTransport | null {
    if (!config.host || !config.fromEmail) {
      return null;
    }
    return new SmtpTransport({ ...config, fromEmail: config.fromEmail });
  }

  async send(message: OutgoingMessage): Promise<void> {
    await this.transporter.sendMail({
      from: this.fromAddress,
      to: this.fromAddress,
      bcc: message.recipients,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
  }
}

const payloadSchema = z.object({
  projectName: z.string().min(1),
  branch: z.string().min(1),
  revision: z.string().min(1),
  runId: z.string().min(1),
  image: z.string().min(1),
  targetUrl: z.string().min(1),
  buildUrl: z.string().min(1),
  timestamp: z.string().datetime(),
  stages: z.array(z.object({ name: z.string().min(1), status: z.enum(['succeeded', 'failed', 'skipped']) })),
});

export type NotifyResult = 'sent' | 'skipped';

export class Notifier {
  private readonly logger: Logger;

  constructor(
    private readonly transport: NotificationTransport | null,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ component: 'notifier' });
  }

  /**
   * Renders and sends one message. Never retried; a transport error surfaces
   * as `NotificationDispatchFailedError` for the caller to report.
   */
  async notify(event: NotificationEvent, redactor?: SecretRedactor): Promise<NotifyResult> {
    const validation = payloadSchema.safeParse(event.payload);
    if (!validation.success) {
      notificationCounter.inc({ kind: event.kind, result: 'invalid' });
      throw new NotificationDispatchFailedError(
        `Notification payload incomplete: ${validation.error.issues.map((issue) => issue.path.join('.')).join(', ')}`,
      );
    }

    if (!this.transport || event.recipients.length === 0) {
      this.logger.info({ kind: event.kind }, 'Notification skipped: no transport or recipients configured');
      notificationCounter.inc({ kind: event.kind, result: 'skipped' });
      return 'skipped';
    }

    const rendered = renderNotification(event, redactor);
    try {
      await this.transport.send({ ...rendered, recipients: event.recipients });
    } catch (error) {
      notificationCounter.inc({ kind: event.kind, result: 'failed' });
      const message = `Failed to send ${event.kind} notification: ${toErrorMessage(error)}`;
      throw new NotificationDispatchFailedError(redactor ? redactor.redact(message) : message, { cause: error });
    }

    notificationCounter.inc({ kind: event.kind, result: 'sent' });
    this.logger.info({ kind: event.kind, recipients: event.recipients.length }, 'Notification sent');
    return 'sent';
  }
}
