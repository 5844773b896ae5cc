import nodemailer from "nodemailer";
import { MailConfig } from "../../config/env.js";
import { describeError } from "../../domain/errors.js";
import { Mailer, OutgoingEmail } from "./types.js";

export interface SmtpTransportOptions {
  host: string;
  port: number;
  secure: boolean;
  requireTLS: boolean;
  auth: { user: string; pass: string };
}

export interface MailTransport {
  sendMail(message: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
}

export type TransportFactory = (options: SmtpTransportOptions) => MailTransport;

const createSmtpTransport: TransportFactory = (options) => nodemailer.createTransport(options);

export class SmtpMailer implements Mailer {
  constructor(
    private readonly config: MailConfig,
    private readonly createTransport: TransportFactory = createSmtpTransport,
  ) {}

  async sendEmail({ subject, body, to }: OutgoingEmail): Promise<boolean> {
    const { senderEmail, senderPassword, smtpServer, smtpPort } = this.config;
    const recipient = to ?? this.config.recipientEmail;

    if (!senderEmail || !senderPassword || !recipient) {
      console.error(
        "[mail] email is not configured (SENDER_EMAIL, SENDER_PASSWORD and COMPANY_EMAIL are required)",
      );
      return false;
    }

    try {
      // Port 465 speaks TLS from the first byte; everything else upgrades with STARTTLS.
      const transport = this.createTransport({
        host: smtpServer,
        port: smtpPort,
        secure: smtpPort === 465,
        requireTLS: smtpPort !== 465,
        auth: { user: senderEmail, pass: senderPassword },
      });
      await transport.sendMail({ from: senderEmail, to: recipient, subject, text: body });
      console.error(`[mail] sent "${subject}" via ${smtpServer}:${smtpPort}`);
      return true;
    } catch (error) {
      console.error(`[mail] failed to send "${subject}": ${describeError(error)}`);
      return false;
    }
  }
}
