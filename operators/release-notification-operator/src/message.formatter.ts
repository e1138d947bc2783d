import type { SlackBlock }          from './notification-provider.interfaces'
import type { NotificationMessage } from './notification-provider.interfaces'
import type { SlackTextObject }     from './notification-provider.interfaces'
import type { ReleaseEnrichment }   from './release-notification.interfaces'
import type { ReleaseSnapshot }     from './release-notification.interfaces'

import { ReadyStatus }              from './release-notification.types'

const outcomes: Record<ReadyStatus, { glyph: string; text: string }> = {
  [ReadyStatus.True]: { glyph: '✅', text: 'Successful' },
  [ReadyStatus.False]: { glyph: '❌', text: 'Failed' },
  [ReadyStatus.Unknown]: { glyph: '⚠️', text: 'Unknown' },
}

const mrkdwn = (text: string): SlackTextObject => ({ type: 'mrkdwn', text })

const formatTimestamp = (date: Date): string =>
  `${date.toISOString().replace('T', ' ').slice(0, 19)} UTC`

export interface MessageFormatterOptions {
  serviceVersionsLimit?: number
}

export class MessageFormatter {
  private readonly serviceVersionsLimit: number

  constructor(options: MessageFormatterOptions = {}) {
    this.serviceVersionsLimit = options.serviceVersionsLimit ?? 15
  }

  formatReleaseDeployed(
    snapshot: ReleaseSnapshot,
    enrichment: ReleaseEnrichment,
    deliveredAt: Date = new Date()
  ): NotificationMessage {
    const { glyph, text: outcome } = outcomes[snapshot.ready]
    const revision = snapshot.revision || 'unknown'

    const blocks: Array<SlackBlock> = [
      {
        type: 'header',
        text: {
          type: 'plain_text',
          text: `${glyph} Deployment to ${snapshot.namespace.toUpperCase()} - ${outcome}`,
          emoji: true,
        },
      },
      {
        type: 'section',
        fields: [
          mrkdwn(`*Release Name:*\n\`${snapshot.name}\``),
          mrkdwn(`*Namespace:*\n\`${snapshot.namespace}\``),
          mrkdwn(`*Helm Chart Version:*\n\`${snapshot.chartVersion}\``),
          mrkdwn(`*App Version:*\n\`${snapshot.appVersion}\``),
          mrkdwn(`*Helm Revision:*\n\`${revision}\``),
          mrkdwn(`*Status:*\n${glyph} ${outcome}`),
        ],
      },
    ]

    if (enrichment.dependencies.length > 0) {
      const lines = enrichment.dependencies.map(
        (dependency) => `  • \`${dependency.name}\`: \`${dependency.version}\``
      )

      blocks.push({
        type: 'section',
        text: mrkdwn(`*Chart Dependencies:*\n${lines.join('\n')}`),
      })
    }

    blocks.push({
      type: 'section',
      text: mrkdwn(`*Service Versions (Docker Images):*\n${this.formatServiceVersions(enrichment)}`),
    })

    if (enrichment.replicas) {
      blocks.push({
        type: 'section',
        text: mrkdwn(`*Replicas:* ${enrichment.replicas.ready}/${enrichment.replicas.desired}`),
      })
    }

    const context = [mrkdwn(`Deployed at ${formatTimestamp(deliveredAt)}`)]

    if (snapshot.message) {
      context.push(mrkdwn(snapshot.message))
    }

    blocks.push({ type: 'context', elements: context })

    return {
      text: `${glyph} ${snapshot.name} deployed to ${snapshot.namespace} (revision ${revision})`,
      blocks,
    }
  }

  private formatServiceVersions({ serviceVersions }: ReleaseEnrichment): string {
    if (serviceVersions.length === 0) {
      return '_No running containers found_'
    }

    const lines = serviceVersions
      .slice(0, this.serviceVersionsLimit)
      .map((version) => `  • \`${version.name}\`: \`${version.image}:${version.tag}\``)

    const hidden = serviceVersions.length - this.serviceVersionsLimit

    if (hidden > 0) {
      lines.push(`  … +${hidden} more`)
    }

    return lines.join('\n')
  }
}
