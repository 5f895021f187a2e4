export interface OutgoingEmail {
  to: string;
  subject: string;
  text: string;
  cc?: string;
}

export interface SendResult {
  success: boolean;
  id?: string;
  error?: string;
}

export interface EmailSender {
  readonly name: string;
  isConfigured(): boolean;
  send(email: OutgoingEmail): Promise<SendResult>;
}

export const EMAIL_SENDER = 'EMAIL_SENDER';
