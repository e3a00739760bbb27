import neo4j, {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isPath,
  isPoint,
  isRelationship,
  isTime,
  isUnboundRelationship,
  type Integer,
} from "neo4j-driver";

export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

export type Row = Record<string, PlainValue>;

/** Integers beyond 2^53 would lose precision as numbers, so they travel as strings. */
function fromInteger(value: Integer): number | string {
  return neo4j.integer.inSafeRange(value) ? value.toNumber() : value.toString();
}

function fromProperties(properties: object): { [key: string]: PlainValue } {
  const out: { [key: string]: PlainValue } = {};
  for (const [key, value] of Object.entries(properties)) {
    out[key] = toPlainValue(value);
  }
  return out;
}

/**
 * Convert a value returned by the driver into plain JSON-safe data. Nothing
 * that references the driver or its session survives the conversion, so
 * results can be serialized after the session has closed.
 */
export function toPlainValue(value: unknown): PlainValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "boolean" || typeof value === "string") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return value.toString();
  if (isInt(value)) return fromInteger(value);

  if (isNode(value)) {
    return {
      identity: toPlainValue(value.identity),
      elementId: value.elementId,
      labels: [...value.labels],
      properties: fromProperties(value.properties),
    };
  }
  if (isRelationship(value)) {
    return {
      identity: toPlainValue(value.identity),
      elementId: value.elementId,
      start: toPlainValue(value.start),
      end: toPlainValue(value.end),
      type: value.type,
      properties: fromProperties(value.properties),
    };
  }
  if (isUnboundRelationship(value)) {
    return {
      identity: toPlainValue(value.identity),
      elementId: value.elementId,
      type: value.type,
      properties: fromProperties(value.properties),
    };
  }
  if (isPath(value)) {
    return {
      start: toPlainValue(value.start),
      end: toPlainValue(value.end),
      segments: value.segments.map((segment) => ({
        start: toPlainValue(segment.start),
        relationship: toPlainValue(segment.relationship),
        end: toPlainValue(segment.end),
      })),
    };
  }
  if (isPoint(value)) {
    const point: { [key: string]: PlainValue } = {
      srid: toPlainValue(value.srid),
      x: value.x,
      y: value.y,
    };
    if (value.z !== undefined) point["z"] = value.z;
    return point;
  }
  if (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isLocalTime(value) ||
    isTime(value) ||
    isDuration(value)
  ) {
    return value.toString();
  }

  if (Array.isArray(value)) return value.map((item) => toPlainValue(item));
  if (value instanceof Uint8Array) return Array.from(value);
  if (typeof value === "object") return fromProperties(value);

  return String(value);
}
