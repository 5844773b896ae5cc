import { Mailer } from "../infra/mail/types.js";

export interface ContactRequest {
  name: string;
  email: string;
  phone: string;
  message: string;
}

export interface MeetingRequest {
  name: string;
  email: string;
  phone: string;
  preferredDate: string;
  meetingPurpose: string;
}

/** Forwards chat form submissions to the company inbox as plain-text email. */
export class LeadRelayService {
  constructor(
    private readonly mailer: Mailer,
    private readonly companyName: string,
  ) {}

  relayContact(request: ContactRequest): Promise<boolean> {
    return this.mailer.sendEmail({
      subject: `New Contact Request from ${request.name}`,
      body: [
        "New Contact Request Received",
        "",
        `Name: ${request.name}`,
        `Email: ${request.email}`,
        `Phone: ${request.phone}`,
        "",
        "Message:",
        request.message,
        "",
        "---",
        `This email was sent automatically from the ${this.companyName} chat assistant contact form.`,
      ].join("\n"),
    });
  }

  relayMeeting(request: MeetingRequest): Promise<boolean> {
    return this.mailer.sendEmail({
      subject: `New Meeting Request from ${request.name}`,
      body: [
        "New Meeting Request Received",
        "",
        `Name: ${request.name}`,
        `Email: ${request.email}`,
        `Phone: ${request.phone}`,
        `Preferred Date/Time: ${request.preferredDate}`,
        "",
        "Meeting Purpose:",
        request.meetingPurpose,
        "",
        "---",
        `This email was sent automatically from the ${this.companyName} chat assistant meeting scheduler.`,
      ].join("\n"),
    });
  }
}
