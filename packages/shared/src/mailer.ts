import { type MailMessage, type MailTemplate, type Mailer } from '@contactbook/domain';
import { type SafeLogger } from './logger';

/**
 * Where mailed links land. Verification is a GET on the API itself; the reset
 * link opens the client app, which posts the new password back to the API.
 */
export interface MailLinkBases {
  apiBaseUrl: string;
  frontendBaseUrl: string;
}

const LINK_TARGETS: Record<MailTemplate, { base: keyof MailLinkBases; path: string }> = {
  'verify-email': { base: 'apiBaseUrl', path: '/users/verify' },
  'password-reset': { base: 'frontendBaseUrl', path: '/reset-password' },
};

export function buildMailLink(bases: MailLinkBases, message: MailMessage): string {
  const target = LINK_TARGETS[message.template];
  const url = new URL(target.path, bases[target.base]);
  url.searchParams.set('token', message.token);
  return url.toString();
}

/** Development mailer: writes the link that would have been emailed to the log. */
export class LogMailer implements Mailer {
  constructor(
    private readonly bases: MailLinkBases,
    private readonly logger: SafeLogger,
  ) {}

  async send(message: MailMessage): Promise<void> {
    this.logger.info(
      { template: message.template, link: buildMailLink(this.bases, message) },
      'Email dispatched',
    );
  }
}

/**
 * Hands messages to the wrapped mailer after the current request has been
 * answered. Delivery is best-effort; failures are logged and dropped.
 */
export class BackgroundMailer implements Mailer {
  constructor(
    private readonly inner: Mailer,
    private readonly logger: SafeLogger,
  ) {}

  async send(message: MailMessage): Promise<void> {
    setImmediate(() => {
      this.inner.send(message).catch((err: unknown) => {
        this.logger.error(
          { template: message.template, err: err instanceof Error ? err.message : String(err) },
          'Email delivery failed',
        );
      });
    });
  }
}
