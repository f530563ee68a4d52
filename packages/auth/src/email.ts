import { createHash } from 'node:crypto';
import { Resend } from 'resend';
import { logger } from '@latchkey/observability';
import { DEFAULT_MAILER_FROM } from './constants.js';
import { TOKEN_TTL_SECONDS, type TokenPurpose } from './signed-token.js';

export interface AuthMailRecipient {
  id: string;
  email: string;
  unconfirmedEmail: string | null;
}

export interface AuthMailMessage {
  user: AuthMailRecipient;
  token: string;
  purpose: TokenPurpose;
}

/**
 * Delivers confirmation and password-reset links. Implementations throw
 * when the message could not be handed off.
 */
export interface AuthMailer {
  deliver(message: AuthMailMessage): Promise<void>;
}

export class MailDeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MailDeliveryError';
  }
}

export function getRecipientLogId(email: string): string {
  return createHash('sha256').update(email.trim().toLowerCase()).digest('hex').slice(0, 12);
}

/**
 * Confirmation mail goes to the pending address when an email change is in
 * flight; reset mail always goes to the confirmed login address.
 */
export function recipientAddressFor({ user, purpose }: Pick<AuthMailMessage, 'user' | 'purpose'>): string {
  if (purpose === 'confirm_email') {
    return user.unconfirmedEmail ?? user.email;
  }
  return user.email;
}

const LINK_PATHS: Record<TokenPurpose, string> = {
  confirm_email: '/v1/confirmations',
  reset_password: '/v1/passwords',
};

/**
 * Appends the route to `appUrl`, keeping any path prefix it carries.
 */
export function buildTokenLink(appUrl: string, purpose: TokenPurpose, token: string): string {
  const url = new URL(appUrl);
  url.pathname = `${url.pathname.replace(/\/+$/, '')}${LINK_PATHS[purpose]}`;
  url.searchParams.set('token', token);
  return url.toString();
}

interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function renderEmail(purpose: TokenPurpose, link: string): RenderedEmail {
  const copy =
    purpose === 'confirm_email'
      ? {
          subject: 'Confirm your email address',
          heading: 'Confirm your email address',
          body: 'Follow the link below to confirm this email address for your account.',
          action: 'Confirm email',
        }
      : {
          subject: 'Reset your password',
          heading: 'Reset your password',
          body: 'Someone asked to reset the password for your account. Follow the link below to choose a new one.',
          action: 'Reset password',
        };

  const href = escapeHtml(link);
  const expiry = `This link will expire in ${Math.round(TOKEN_TTL_SECONDS[purpose] / 60)} minutes.`;
  const ignore = "If you didn't request this email, you can safely ignore it.";

  return {
    subject: copy.subject,
    html: `
      <!DOCTYPE html>
      <html>
        <head>
          <meta charset="utf-8">
          <meta name="viewport" content="width=device-width, initial-scale=1.0">
        </head>
        <body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
          <h1 style="color: #2563eb; margin-bottom: 24px;">${copy.heading}</h1>
          <p style="margin-bottom: 24px;">${copy.body}</p>
          <a href="${href}" style="display: inline-block; background-color: #2563eb; color: white; padding: 12px 24px; text-decoration: none; border-radius: 6px; font-weight: 600; margin-bottom: 24px;">${copy.action}</a>
          <p style="margin-bottom: 16px; color: #666; font-size: 14px;">Or copy and paste this link into your browser:</p>
          <p style="margin-bottom: 24px; word-break: break-all; color: #2563eb; font-size: 14px;">${href}</p>
          <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 32px 0;">
          <p style="color: #666; font-size: 14px; margin-bottom: 8px;">${expiry}</p>
          <p style="color: #666; font-size: 14px;">${ignore}</p>
        </body>
      </html>
    `,
    text: [copy.heading, '', copy.body, '', link, '', expiry, '', ignore].join('\n'),
  };
}

export interface ResendAuthMailerOptions {
  apiKey: string;
  appUrl: string;
  from?: string;
}

export class ResendAuthMailer implements AuthMailer {
  private client: Resend | null = null;

  constructor(private readonly options: ResendAuthMailerOptions) {}

  async deliver(message: AuthMailMessage): Promise<void> {
    // Lazy-load Resend client so constructing the mailer never touches the network stack
    this.client ??= new Resend(this.options.apiKey);

    const to = recipientAddressFor(message);
    const from = this.options.from || DEFAULT_MAILER_FROM;
    const recipient = getRecipientLogId(to);
    const { subject, html, text } = renderEmail(
      message.purpose,
      buildTokenLink(this.options.appUrl, message.purpose, message.token)
    );

    logger.debug({ recipient, purpose: message.purpose }, 'Sending auth email');

    const result = await this.client.emails.send({ from, to, subject, html, text });

    if (result.error) {
      throw new MailDeliveryError(`Failed to send email: ${result.error.message}`, {
        cause: result.error,
      });
    }

    logger.info({ recipient, purpose: message.purpose, emailId: result.data?.id }, 'Auth email sent');
  }
}

/**
 * Used when no mail provider is configured. Records that a message would
 * have been sent without ever writing the token out.
 */
export class LoggingAuthMailer implements AuthMailer {
  async deliver(message: AuthMailMessage): Promise<void> {
    logger.warn(
      { recipient: getRecipientLogId(recipientAddressFor(message)), purpose: message.purpose },
      'Mail delivery disabled; auth email not sent'
    );
  }
}
