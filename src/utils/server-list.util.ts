import { Logger } from '@nestjs/common';

export interface ServerAddress {
  host: string;
  port: number;
}

const logger = new Logger('ServerList');

/**
 * Parse `host:port` entries. Malformed entries are logged and left out.
 */
export function parseServerList(servers: readonly string[]): ServerAddress[] {
  const parsed: ServerAddress[] = [];

  for (const entry of servers) {
    const parts = entry.trim().split(':');
    const port = Number(parts[1]);

    if (
      parts.length !== 2 ||
      parts[0] === '' ||
      !Number.isInteger(port) ||
      port <= 0 ||
      port > 65535
    ) {
      logger.error(`Invalid server ${entry} in counter store server list`);
      continue;
    }

    parsed.push({ host: parts[0], port });
  }

  return parsed;
}

/**
 * Split a comma separated env value into trimmed, non-empty entries
 */
export function splitServerString(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
