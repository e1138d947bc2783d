export interface SlackTextObject {
  type: 'plain_text' | 'mrkdwn'
  text: string
  emoji?: boolean
}

export interface SlackHeaderBlock {
  type: 'header'
  text: SlackTextObject
}

export interface SlackSectionBlock {
  type: 'section'
  text?: SlackTextObject
  fields?: Array<SlackTextObject>
}

export interface SlackContextBlock {
  type: 'context'
  elements: Array<SlackTextObject>
}

export type SlackBlock = SlackContextBlock | SlackHeaderBlock | SlackSectionBlock

export interface NotificationMessage {
  text: string
  blocks: Array<SlackBlock>
}

export interface NotificationProvider {
  notify(message: NotificationMessage): Promise<void>
}
