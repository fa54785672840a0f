export type ConnectionUpgradeValue = 'upgrade' | 'close';

export const CONNECTION_UPGRADE_VARIABLE = '$connection_upgrade';

export interface ConnectionUpgradeMap {
  source: string;
  target: string;
  defaultValue: string | undefined;
  entries: Record<string, string>;
}

export const renderConnectionUpgradeMap = (): string =>
  [
    `map $http_upgrade ${CONNECTION_UPGRADE_VARIABLE} {`,
    '  default upgrade;',
    "  '' close;",
    '}',
  ].join('\n');

/**
 * Value nginx assigns to $connection_upgrade for a request's Upgrade header.
 * A missing header reads as the empty string in nginx.
 */
export const resolveConnectionUpgrade = (upgradeHeader: string | undefined): ConnectionUpgradeValue =>
  (upgradeHeader ?? '') === '' ? 'close' : 'upgrade';

/**
 * Evaluate a parsed `map` block the way nginx would for exact-match keys.
 * nginx compares map strings case-insensitively.
 */
export const evaluateMap = (map: ConnectionUpgradeMap, input: string): string | undefined => {
  const needle = input.toLowerCase();
  const key = Object.keys(map.entries).find((entry) => entry.toLowerCase() === needle);
  return key === undefined ? map.defaultValue : map.entries[key];
};
