export class CampaignConfigurationError extends Error {
  constructor(message = 'Email delivery is not configured: set MAILGUN_API_KEY and MAILGUN_DOMAIN') {
    super(message);
    this.name = 'CampaignConfigurationError';
  }
}
