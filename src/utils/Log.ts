// Engine log for halfblock3d
// Keeps the most recent messages in memory; the demo draws them as an overlay

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogMessage {
  timestamp: number;
  level: LogLevel;
  text: string;
}

export type LogListener = (message: LogMessage) => void;

export class EngineLog {
  private messages: LogMessage[] = [];
  private maxMessages: number;
  private listeners: Set<LogListener> = new Set();

  constructor(maxMessages: number = 100) {
    this.maxMessages = Math.max(1, Math.floor(maxMessages));
  }

  info(text: string): void {
    this.addMessage('info', text);
  }

  warn(text: string): void {
    this.addMessage('warn', text);
  }

  error(text: string): void {
    this.addMessage('error', text);
  }

  debug(text: string): void {
    this.addMessage('debug', text);
  }

  private addMessage(level: LogLevel, text: string): void {
    const message: LogMessage = { timestamp: Date.now(), level, text };
    this.messages.push(message);

    // Trim old messages
    while (this.messages.length > this.maxMessages) {
      this.messages.shift();
    }

    for (const listener of this.listeners) {
      listener(message);
    }
  }

  // Returns an unsubscribe function
  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getMessages(): readonly LogMessage[] {
    return this.messages;
  }

  getRecent(count: number): LogMessage[] {
    return this.messages.slice(Math.max(0, this.messages.length - count));
  }

  clear(): void {
    this.messages = [];
  }

  // Most recent messages as coloured terminal lines, newest last
  render(screenWidth: number, maxLines: number): string[] {
    const lines: string[] = [];
    const contentWidth = Math.max(4, screenWidth - 2);

    for (const msg of this.getRecent(maxLines)) {
      let color = '37'; // white
      let prefix = '';
      switch (msg.level) {
        case 'error': color = '31'; prefix = '[ERROR] '; break;
        case 'warn': color = '33'; prefix = '[WARN] '; break;
        case 'debug': color = '36'; prefix = '[DEBUG] '; break;
        case 'info': break;
      }

      const text = prefix + msg.text;
      const truncated = text.length > contentWidth ? text.slice(0, contentWidth - 3) + '...' : text;
      lines.push(`\x1b[${color}m ${truncated}\x1b[0m`);
    }

    return lines;
  }
}

// Singleton instance
let logInstance: EngineLog | null = null;

export function getEngineLog(): EngineLog {
  if (!logInstance) {
    logInstance = new EngineLog();
  }
  return logInstance;
}

// Convenience logging functions
export function logInfo(text: string): void {
  getEngineLog().info(text);
}

export function logWarn(text: string): void {
  getEngineLog().warn(text);
}

export function logError(text: string): void {
  getEngineLog().error(text);
}

export function logDebug(text: string): void {
  getEngineLog().debug(text);
}
