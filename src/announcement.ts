/**
 * Decoder for the `--parsable` output of avahi-browse.
 *
 * Each line is one announcement, fields separated by `;`:
 *
 *   +;eth0;IPv4;My\032Light;_elg._tcp;local
 *   =;eth0;IPv4;My\032Light;_elg._tcp;local;my-light.local;192.168.0.92;9123;"txt=..."
 *   -;eth0;IPv4;My\032Light;_elg._tcp;local
 */

import { isIP } from "net";

export type AnnouncementMode = "new" | "resolved" | "exited";

export type AddressFamily = "IPv4" | "IPv6";

export interface IpAddress {
  family: 4 | 6;
  address: string;
}

export interface AnnouncementBase {
  /** Interface the announcement was received on */
  interfaceName: string;
  family: AddressFamily;
  /** Service instance name, escapes decoded */
  hostname: string;
  serviceType: string;
  domain: string;
}

export interface ServiceRecord {
  name: string;
  /** mDNS hostname of the service, as printed */
  hostname: string;
  address: IpAddress;
  port: number;
  /** Trailing fields, verbatim */
  txt: string[];
}

export type Announcement =
  | { mode: "new"; base: AnnouncementBase }
  | { mode: "resolved"; base: AnnouncementBase; service: ServiceRecord }
  | { mode: "exited"; base: AnnouncementBase };

export type AnnouncementErrorKind =
  | "not-enough-arguments"
  | "invalid-mode"
  | "invalid-address-family"
  | "invalid-address"
  | "invalid-port"
  | "invalid-escape";

export class AnnouncementParseError extends Error {
  readonly kind: AnnouncementErrorKind;
  /** Index of the offending field, when known */
  readonly field: number | undefined;
  line: string | undefined;

  constructor(kind: AnnouncementErrorKind, message: string, field?: number) {
    super(message);
    this.name = "AnnouncementParseError";
    this.kind = kind;
    this.field = field;
  }
}

export type SafeParseResult =
  | { success: true; data: Announcement }
  | { success: false; error: AnnouncementParseError };

const FIELD_SEPARATOR = ";";
const ESCAPE_PATTERN = /\\(\d{1,3})/g;
const PORT_PATTERN = /^\+?\d+$/;

export function decodeEscapes(text: string): string {
  return text.replace(ESCAPE_PATTERN, (_match, digits: string) => {
    const code = Number(digits);
    if (code > 0xff) {
      throw new AnnouncementParseError(
        "invalid-escape",
        `Escaped character code out of range: \\${digits}`
      );
    }
    return String.fromCharCode(code);
  });
}

export function unescapeHostname(text: string): string {
  return decodeEscapes(text.replaceAll("\\.", "."));
}

function parseMode(field: string): AnnouncementMode {
  const c = field.charAt(0);
  switch (c) {
    case "+":
      return "new";
    case "=":
      return "resolved";
    case "-":
      return "exited";
    case "":
      throw new AnnouncementParseError("not-enough-arguments", "Not enough arguments", 0);
    default:
      throw new AnnouncementParseError("invalid-mode", `Failed to parse mode: ${c}`, 0);
  }
}

function parseFamily(field: string): AddressFamily {
  if (field === "IPv4" || field === "IPv6") return field;
  throw new AnnouncementParseError(
    "invalid-address-family",
    `Failed to parse internet protocol: ${field}`,
    2
  );
}

function parseAddress(field: string): IpAddress {
  // isIP accepts scoped literals ("fe80::1%eth0"); only plain addresses are valid here.
  const family = field.includes("%") ? 0 : isIP(field);
  if (family === 4 || family === 6) {
    return { family, address: field };
  }
  throw new AnnouncementParseError("invalid-address", `Invalid IP address: ${field}`, 7);
}

function parsePort(field: string): number {
  const port = PORT_PATTERN.test(field) ? Number(field) : NaN;
  if (!Number.isInteger(port) || port > 0xffff) {
    throw new AnnouncementParseError("invalid-port", `Invalid port: ${field}`, 8);
  }
  return port;
}

function decode(line: string): Announcement {
  const fields = line.split(FIELD_SEPARATOR);

  const field = (index: number): string => {
    const value = fields[index];
    if (value === undefined) {
      throw new AnnouncementParseError("not-enough-arguments", "Not enough arguments", index);
    }
    return value;
  };

  const mode = parseMode(field(0));
  const base: AnnouncementBase = {
    interfaceName: field(1),
    family: parseFamily(field(2)),
    hostname: unescapeHostname(field(3)),
    serviceType: field(4),
    domain: field(5),
  };

  if (mode !== "resolved") {
    return { mode, base };
  }

  return {
    mode,
    base,
    service: {
      name: base.serviceType,
      hostname: field(6),
      address: parseAddress(field(7)),
      port: parsePort(field(8)),
      txt: fields.slice(9),
    },
  };
}

/**
 * Decodes one line, throwing {@link AnnouncementParseError} when it does not
 * follow the format.
 */
export function parseAnnouncement(line: string): Announcement {
  try {
    return decode(line);
  } catch (err: unknown) {
    if (err instanceof AnnouncementParseError) {
      err.line = line;
    }
    throw err;
  }
}

export function safeParseAnnouncement(line: string): SafeParseResult {
  try {
    return { success: true, data: parseAnnouncement(line) };
  } catch (err: unknown) {
    if (err instanceof AnnouncementParseError) {
      return { success: false, error: err };
    }
    throw err;
  }
}
