import Axios                         from 'axios'

import type { NotificationMessage }  from './notification-provider.interfaces'
import type { NotificationProvider } from './notification-provider.interfaces'

import { NotificationDeliveryError } from './notification.errors'

export class SlackNotificationProvider implements NotificationProvider {
  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs = 10000
  ) {}

  async notify(message: NotificationMessage): Promise<void> {
    try {
      await Axios.post(this.webhookUrl, message, {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.timeoutMs,
      })
    } catch (error) {
      if (Axios.isAxiosError(error)) {
        throw new NotificationDeliveryError(
          `Slack webhook request failed: ${error.response?.status ?? error.code ?? 'no response'}`,
          error.response?.status
        )
      }

      throw error
    }
  }
}
