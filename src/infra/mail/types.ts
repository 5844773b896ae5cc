export interface OutgoingEmail {
  subject: string;
  body: string;
  /** Defaults to the configured company inbox. */
  to?: string;
}

export interface Mailer {
  /** Resolves `false` when the message could not be sent; never rejects. */
  sendEmail(email: OutgoingEmail): Promise<boolean>;
}
