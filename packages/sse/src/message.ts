/**
 * A server-sent event. An empty `event` is the default message event.
 */
export interface Message {
  event: string;
  data: string;
  id?: string;
  /** Reconnection delay in milliseconds */
  retry?: number;
}

const LINE_BREAK = /\r\n|\r|\n/;

function singleLine(value: string): string {
  return value.split(LINE_BREAK).join(' ');
}

/**
 * Frame a message as `field: value` lines followed by a blank line.
 * Multi-line data becomes one `data:` line per line.
 */
export function formatMessage(message: Message): string {
  const lines: string[] = [];
  if (message.event) {
    lines.push(`event: ${singleLine(message.event)}`);
  }
  for (const line of message.data.split(LINE_BREAK)) {
    lines.push(`data: ${line}`);
  }
  if (message.id) {
    lines.push(`id: ${singleLine(message.id)}`);
  }
  if (message.retry !== undefined) {
    lines.push(`retry: ${message.retry}`);
  }
  return `${lines.join('\n')}\n\n`;
}
