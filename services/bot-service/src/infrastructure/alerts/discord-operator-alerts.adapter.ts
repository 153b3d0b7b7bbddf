import { Injectable } from '@nestjs/common';
import type {
  OperatorAlert,
  OperatorAlertsPort,
} from '../../application/dead-letters/ports/operator-alerts.port';
import { BotServiceConfigService } from '../config/bot-service-config.service';

export class OperatorAlertError extends Error {
  constructor(
    readonly channelId: string,
    reason: string,
  ) {
    super(`Failed to send operator alert to channel ${channelId} (${reason}).`);
    this.name = 'OperatorAlertError';
  }
}

/**
 * Posts alert text into the operator channel through the chat platform's REST API.
 */
@Injectable()
export class DiscordOperatorAlertsAdapter implements OperatorAlertsPort {
  constructor(private readonly config: BotServiceConfigService) {}

  async sendAlert(alert: OperatorAlert): Promise<void> {
    const channelId = this.config.deadLetterAlertChannelId;
    let response: Response;

    try {
      response = await fetch(`${this.config.chatApiUrl}/channels/${encodeURIComponent(channelId)}/messages`, {
        method: 'POST',
        headers: {
          accept: 'application/json',
          authorization: `Bot ${this.config.chatBotToken}`,
          'content-type': 'application/json',
        },
        body: JSON.stringify({
          content: alert.text,
          allowed_mentions: { parse: [] },
        }),
        signal: AbortSignal.timeout(this.config.chatApiTimeoutMs),
      });
    } catch (error) {
      throw new OperatorAlertError(channelId, error instanceof Error ? error.message : 'unknown error');
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new OperatorAlertError(channelId, `status ${response.status}${text ? `: ${text.slice(0, 300)}` : ''}`);
    }
  }
}
