/**
 * JSON-RPC 2.0 メッセージコーデック
 * 送信メッセージの直列化と、受信1行のエンベロープ判別を行う
 */
import {
  JsonRpcEnvelopeSchema,
  JsonRpcIdSchema,
  isRecord,
  type IncomingMessage,
  type JsonObject,
  type JsonRpcErrorObject,
  type JsonRpcId,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse
} from '@tenki/shared';
import { DecodeError } from '../error/index.js';

export class MessageCodec {
  encodeRequest(id: number, method: string, params?: JsonObject): string {
    const request: JsonRpcRequest = { jsonrpc: '2.0', id, method };
    if (params !== undefined) {
      request.params = params;
    }
    return JSON.stringify(request);
  }

  encodeNotification(method: string, params?: JsonObject): string {
    const notification: JsonRpcNotification = { jsonrpc: '2.0', method };
    if (params !== undefined) {
      notification.params = params;
    }
    return JSON.stringify(notification);
  }

  // ワーカー発のリクエストへの応答
  encodeResult(id: JsonRpcId, result: JsonObject): string {
    const response: JsonRpcResponse = { jsonrpc: '2.0', id, result };
    return JSON.stringify(response);
  }

  encodeError(id: JsonRpcId, error: JsonRpcErrorObject): string {
    const response: JsonRpcResponse = { jsonrpc: '2.0', id, error };
    return JSON.stringify(response);
  }

  decode(line: string): IncomingMessage {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new DecodeError(`Invalid JSON: ${truncate(line)}`);
    }

    if (!isRecord(raw)) {
      throw new DecodeError(`Expected a JSON object: ${truncate(line)}`);
    }

    const rawId = readId(raw);
    const parsed = JsonRpcEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
      throw new DecodeError(`Malformed JSON-RPC envelope${where}: ${issue?.message ?? 'invalid'}`, rawId);
    }

    const envelope = parsed.data;
    const id = envelope.id ?? undefined;

    if (envelope.method !== undefined) {
      if (id === undefined) {
        return { kind: 'notification', method: envelope.method, params: envelope.params };
      }
      return { kind: 'request', id, method: envelope.method, params: envelope.params };
    }

    if (id === undefined) {
      throw new DecodeError('Response is missing an "id"');
    }

    if (envelope.error !== undefined) {
      return { kind: 'error', id, error: envelope.error };
    }

    if ('result' in raw) {
      return { kind: 'result', id, result: raw.result };
    }

    throw new DecodeError(`Response ${id} carries neither "result" nor "error"`, id);
  }
}

function readId(raw: Record<string, unknown>): JsonRpcId | undefined {
  const parsed = JsonRpcIdSchema.safeParse(raw.id);
  return parsed.success ? parsed.data : undefined;
}

function truncate(line: string, max = 120): string {
  return line.length > max ? `${line.slice(0, max)}…` : line;
}
