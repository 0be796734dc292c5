import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { SmtpConfig } from '../config/env';
import type { Booking } from '../types/booking';
import { loggers } from '../utils/logger';

/**
 * Email Service
 * Transactional emails over an authenticated SMTP relay. Sending never throws:
 * callers get an EmailResult and decide what to tell the user.
 */

export type EmailResult =
  | { status: 'sent'; messageId: string }
  | { status: 'not_configured' }
  | { status: 'failed'; error: string };

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<{ messageId: string }>;
}

export type TransportFactory = (options: SMTPTransport.Options) => MailTransport;

export interface BookingNotifier {
  sendConfirmation(booking: Booking, cancelUrl: string): Promise<EmailResult>;
  sendThankYou(booking: Booking): Promise<EmailResult>;
}

const IMPLICIT_TLS_PORT = 465;

interface ResolvedSmtp {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
  notify?: string;
  timeoutMs: number;
}

function resolveSmtp(config: SmtpConfig): ResolvedSmtp | null {
  const from = config.from ?? config.user;
  if (!config.host || !config.user || !config.password || !from) {
    return null;
  }
  return {
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    from,
    notify: config.notify,
    timeoutMs: config.timeoutMs,
  };
}

function buildTransportOptions(smtp: ResolvedSmtp): SMTPTransport.Options {
  const implicitTls = smtp.port === IMPLICIT_TLS_PORT;
  return {
    host: smtp.host,
    port: smtp.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: { user: smtp.user, pass: smtp.password },
    connectionTimeout: smtp.timeoutMs,
    greetingTimeout: smtp.timeoutMs,
    socketTimeout: smtp.timeoutMs,
  };
}

export function confirmationText(booking: Booking, cancelUrl: string): string {
  return [
    'Grazie per la tua richiesta di prenotazione.',
    '',
    `Nome: ${booking.nome} ${booking.cognome}`,
    `Telefono: ${booking.telefono}`,
    `Email: ${booking.email}`,
    `Data e ora: ${booking.data_ora ?? ''}`,
    `Note: ${booking.note || 'Nessuna nota.'}`,
    '',
    'Se devi annullare la prenotazione, usa questo link:',
    cancelUrl,
    '',
    'Ti contatteremo a breve per confermare.',
  ].join('\n');
}

export function thankYouText(booking: Booking): string {
  return [
    `Ciao ${booking.nome} ${booking.cognome},`,
    '',
    `grazie per la visita del ${booking.data_ora ?? ''}.`,
    'Speriamo di rivederti presto.',
  ].join('\n');
}

const defaultTransportFactory: TransportFactory = (options) => nodemailer.createTransport(options);

export class EmailService implements BookingNotifier {
  private readonly smtp: ResolvedSmtp | null;
  private transport: MailTransport | null = null;

  constructor(
    config: SmtpConfig,
    private readonly transportFactory: TransportFactory = defaultTransportFactory
  ) {
    this.smtp = resolveSmtp(config);
  }

  get isConfigured(): boolean {
    return this.smtp !== null;
  }

  async sendConfirmation(booking: Booking, cancelUrl: string): Promise<EmailResult> {
    return this.send('confirmation', booking, {
      subject: 'Conferma prenotazione',
      text: confirmationText(booking, cancelUrl),
      bccNotify: true,
    });
  }

  async sendThankYou(booking: Booking): Promise<EmailResult> {
    return this.send('thank_you', booking, {
      subject: 'Grazie per la visita',
      text: thankYouText(booking),
      bccNotify: false,
    });
  }

  private async send(
    kind: string,
    booking: Booking,
    content: { subject: string; text: string; bccNotify: boolean }
  ): Promise<EmailResult> {
    if (!this.smtp) {
      loggers.emailDelivery(kind, booking.id, 'not_configured');
      return { status: 'not_configured' };
    }

    const message: SendMailOptions = {
      from: this.smtp.from,
      to: booking.email,
      subject: content.subject,
      text: content.text,
    };
    if (content.bccNotify && this.smtp.notify) {
      message.bcc = this.smtp.notify;
    }

    try {
      if (!this.transport) {
        this.transport = this.transportFactory(buildTransportOptions(this.smtp));
      }
      const info = await this.transport.sendMail(message);
      loggers.emailDelivery(kind, booking.id, 'sent');
      return { status: 'sent', messageId: info.messageId };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      loggers.emailDelivery(kind, booking.id, 'failed', reason);
      return { status: 'failed', error: reason };
    }
  }
}
