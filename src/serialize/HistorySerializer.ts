import superjson from 'superjson';
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import type { StateChangeRecord } from '../utils/TimeTypes';
import { parseTimeState, parseTimeStatePriority, parseTransitionKind } from '../utils/TimeTypes';
import type {
  DeserializationOptions,
  DeserializationResult,
  SerializationOptions,
  SerializationResult,
  SerializationVersion
} from '../utils/SerializationTypes';
import { CURRENT_SERIALIZATION_VERSION, SerializationFormat } from '../utils/SerializationTypes';

type SuperJSONPayload = Parameters<typeof superjson.deserialize>[0];

interface HistoryEnvelope {
  version: SerializationVersion;
  timestamp: number;
  data: unknown[];
}

/**
 * Diagnostic dumps of the state history using Superjson and MessagePack
 * 使用Superjson和MessagePack导出状态历史的诊断数据
 *
 * @example
 * ```typescript
 * const serializer = new HistorySerializer();
 *
 * // JSON (human-readable)
 * const json = await serializer.serialize(machine.history(), { prettyPrint: true });
 *
 * // MessagePack (binary, compact)
 * const binary = await serializer.serialize(machine.history(), { format: SerializationFormat.Binary });
 * const { object: records } = await serializer.deserialize(binary.data);
 * ```
 */
export class HistorySerializer {
  /**
   * Serialize records to specified format
   * 将记录序列化为指定格式
   */
  serialize(
    records: readonly StateChangeRecord[],
    options: SerializationOptions = {}
  ): Promise<SerializationResult> {
    const startTime = performance.now();
    const format = options.format ?? SerializationFormat.JSON;

    try {
      let data: string | Uint8Array;
      let size: number;

      const envelope: HistoryEnvelope = {
        version: CURRENT_SERIALIZATION_VERSION,
        timestamp: Date.now(),
        data: records.map(record => ({ ...record }))
      };

      switch (format) {
        case SerializationFormat.JSON: {
          const jsonString = superjson.stringify(envelope);
          data = options.prettyPrint ? JSON.stringify(JSON.parse(jsonString), null, 2) : jsonString;
          size = new TextEncoder().encode(data).length;
          break;
        }

        case SerializationFormat.Binary: {
          data = new Uint8Array(msgpackEncode(superjson.serialize(envelope)));
          size = data.length;
          break;
        }

        default:
          throw new Error(`Unsupported serialization format: ${String(format)}`);
      }

      const result: SerializationResult = {
        data,
        format,
        size,
        time: performance.now() - startTime
      };

      if (options.includeMetadata) {
        result.metadata = {
          version: CURRENT_SERIALIZATION_VERSION,
          timestamp: envelope.timestamp,
          format,
          recordCount: records.length
        };
      }

      return Promise.resolve(result);
    } catch (error) {
      return Promise.reject(new Error(`Serialization failed: ${error instanceof Error ? error.message : String(error)}`));
    }
  }

  /**
   * Deserialize a dump; strings are read as JSON, byte arrays as MessagePack
   * 反序列化；字符串按JSON读取，字节数组按MessagePack读取
   */
  deserialize(
    data: string | Uint8Array,
    options: DeserializationOptions = {}
  ): Promise<DeserializationResult<StateChangeRecord[]>> {
    const startTime = performance.now();

    try {
      const envelope = toEnvelope(typeof data === 'string' ? superjson.parse<unknown>(data) : decodeBinary(data));
      const warnings: string[] = [];

      if (!isVersionCompatible(envelope.version)) {
        const message = `Incompatible version. Source: ${formatVersion(envelope.version)}, ` +
          `Current: ${formatVersion(CURRENT_SERIALIZATION_VERSION)}`;
        if (options.strict) {
          throw new Error(message);
        }
        warnings.push(message);
      }

      const records = envelope.data.map((entry, index) => {
        const record = toRecord(entry);
        if (!record) {
          throw new Error(`Invalid history record at index ${index}`);
        }
        return record;
      });

      return Promise.resolve({
        object: records,
        sourceVersion: envelope.version,
        time: performance.now() - startTime,
        warnings
      });
    } catch (error) {
      return Promise.reject(new Error(`Deserialization failed: ${error instanceof Error ? error.message : String(error)}`));
    }
  }
}

function decodeBinary(data: Uint8Array): unknown {
  const decoded = msgpackDecode(data);
  if (!isSuperJSONPayload(decoded)) {
    throw new Error('Binary payload is not a superjson document');
  }
  return superjson.deserialize<unknown>(decoded);
}

function isSuperJSONPayload(value: unknown): value is SuperJSONPayload {
  return typeof value === 'object' && value !== null && 'json' in value;
}

function fieldsOf(value: unknown): Map<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  return new Map<string, unknown>(Object.entries(value));
}

function toVersion(value: unknown): SerializationVersion | undefined {
  const fields = fieldsOf(value);
  if (!fields) return undefined;
  const major = fields.get('major');
  const minor = fields.get('minor');
  const patch = fields.get('patch');
  if (typeof major !== 'number' || typeof minor !== 'number' || typeof patch !== 'number') {
    return undefined;
  }
  return { major, minor, patch };
}

function toEnvelope(value: unknown): HistoryEnvelope {
  const fields = fieldsOf(value);
  const version = toVersion(fields?.get('version'));
  const timestamp = fields?.get('timestamp');
  const data = fields?.get('data');
  if (!version || typeof timestamp !== 'number' || !Array.isArray(data)) {
    throw new Error('Malformed history envelope');
  }
  return { version, timestamp, data };
}

function toRecord(value: unknown): StateChangeRecord | undefined {
  const fields = fieldsOf(value);
  if (!fields) return undefined;

  const fromState = parseTimeState(fields.get('fromState'));
  const toState = parseTimeState(fields.get('toState'));
  const kind = parseTransitionKind(fields.get('kind'));
  const priority = parseTimeStatePriority(fields.get('priority'));
  const fromScale = fields.get('fromScale');
  const toScale = fields.get('toScale');
  const duration = fields.get('duration');
  const reason = fields.get('reason');
  const timestamp = fields.get('timestamp');

  if (
    fromState === undefined || toState === undefined || kind === undefined || priority === undefined ||
    typeof fromScale !== 'number' || typeof toScale !== 'number' || typeof duration !== 'number' ||
    typeof reason !== 'string' || typeof timestamp !== 'number'
  ) {
    return undefined;
  }

  return Object.freeze({ fromState, toState, fromScale, toScale, duration, kind, priority, reason, timestamp });
}

/**
 * Major must match, source must not be newer than current
 * 主版本必须一致，源版本不能比当前新
 */
function isVersionCompatible(source: SerializationVersion): boolean {
  const current = CURRENT_SERIALIZATION_VERSION;
  if (source.major !== current.major) return false;
  if (source.minor > current.minor) return false;
  if (source.minor === current.minor && source.patch > current.patch) return false;
  return true;
}

function formatVersion(v: SerializationVersion): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}
