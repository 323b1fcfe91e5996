import { RenderError, type RenderContext, type Topic, type TopicRenderer } from '@parlor/chat-eventhub';
import { formatDistance } from 'date-fns';
import { escapeHtml } from './html.js';
import type { ChatMessage, MessageSource } from './messageStore.js';
import { timestampFromUuid } from './uuidTimestamp.js';

export interface RenderMessageOptions {
  viewerId: string;
  topic: Topic;
  /** Replace the existing element in place (`hx-swap-oob`), used for edits */
  swapOob: boolean;
  /** Reference point for the relative time label */
  now: Date;
}

function messagePath(topic: Topic, messageId: string): string {
  return `/servers/${topic.serverId}/channels/${topic.channelId}/messages/${messageId}`;
}

/**
 * Render one message as the chat list item its viewer sees
 *
 * The author gets their bubble on the right, highlighted, with an Edit
 * button; everyone gets Delete.
 *
 * @throws RenderError when the message id carries no creation time
 */
export function renderMessage(message: ChatMessage, { viewerId, topic, swapOob, now }: RenderMessageOptions): string {
  const createdAt = timestampFromUuid(message.id);
  if (!createdAt) {
    throw new RenderError(message.id, `No timestamp in message id ${message.id}`);
  }

  const isAuthor = message.authorId === viewerId;
  const id = escapeHtml(message.id);
  const path = escapeHtml(messagePath(topic, message.id));

  const edited =
    message.updated.getTime() > createdAt.getTime() ? '<span class="italic text-xs opacity-50">Edited </span>' : '';
  const relative = formatDistance(createdAt, now, { addSuffix: true });
  const editButton = isAuthor
    ? `<button class="link mr-2 opacity-0 group-hover:opacity-100" hx-get="${path}/editable">Edit</button>`
    : '';

  return [
    `<li class="group chat ${isAuthor ? 'chat-end' : 'chat-start'}" id="msg-${id}"${swapOob ? ' hx-swap-oob="true"' : ''}>`,
    '<div class="chat-header">',
    edited,
    `${escapeHtml(message.authorName)} `,
    `<time class="text-xs opacity-50" datetime="${createdAt.toISOString()}">${escapeHtml(relative)}</time>`,
    '</div>',
    `<div class="chat-bubble${isAuthor ? ' chat-bubble-primary' : ''}">${escapeHtml(message.content)}</div>`,
    '<div class="chat-footer transition-opacity" hx-target="closest li" hx-swap="outerHTML">',
    editButton,
    `<button class="link link-error opacity-0 group-hover:opacity-100" hx-delete="${path}" hx-confirm="Are you sure?">Delete</button>`,
    '</div>',
    '</li>',
  ].join('');
}

/**
 * Removal instruction for a deleted message
 */
export function renderDeletion(messageId: string): string {
  return `<div id="msg-${escapeHtml(messageId)}" hx-swap-oob="delete"></div>`;
}

/**
 * Connects the fan-out workers to the message store and the chat markup
 */
export class ChatMessageRenderer implements TopicRenderer<ChatMessage> {
  constructor(
    private readonly source: MessageSource,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  fetchEntity(messageId: string): Promise<ChatMessage | null> {
    return this.source.fetchMessage(messageId);
  }

  renderEntity(message: ChatMessage, context: RenderContext): string {
    return renderMessage(message, {
      viewerId: context.viewerId,
      topic: context.topic,
      swapOob: context.kind === 'update',
      now: this.clock(),
    });
  }

  renderDeletion(messageId: string, _topic: Topic): string {
    return renderDeletion(messageId);
  }
}
