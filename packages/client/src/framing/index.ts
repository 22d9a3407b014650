/**
 * 改行区切りフレーミング
 * 1行 = 1メッセージ。チャンクをまたぐ部分行は改行が届くまで保持する
 */

export class LineFramer {
  private buffer = '';

  /**
   * チャンクを追加し、完結した行をすべて返す
   */
  push(chunk: string): string[] {
    this.buffer += chunk;

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    const messages: string[] = [];
    for (const line of lines) {
      const message = line.endsWith('\r') ? line.slice(0, -1) : line;
      if (message.trim()) {
        messages.push(message);
      }
    }

    return messages;
  }

  /**
   * ストリーム終端で改行のない残りを取り出す
   */
  flush(): string | undefined {
    const rest = this.buffer;
    this.buffer = '';
    return rest.trim() ? rest : undefined;
  }

  reset(): void {
    this.buffer = '';
  }

  getBufferedLength(): number {
    return this.buffer.length;
  }

  frame(message: string): string {
    if (message.includes('\n')) {
      throw new Error('Framed message must not contain a newline');
    }
    return `${message}\n`;
  }
}
