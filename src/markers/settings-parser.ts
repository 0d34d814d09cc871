/**
 * Settings Parser
 *
 * Parses directive parameter strings (`key=value,key=value`) into settings.
 */

export interface HeaderSettings {
  readingTime: boolean;
  submitIssue: boolean;
  colabPath: string | null;
}

export const DEFAULT_HEADER_SETTINGS: Readonly<HeaderSettings> = {
  readingTime: true,
  submitIssue: true,
  colabPath: null,
};

/**
 * Split a parameter string into a key/value map.
 * Pairs without `=` are dropped; keys and values are trimmed.
 */
export function parseParamString(paramStr: string): Map<string, string> {
  const params = new Map<string, string>();

  for (const pair of paramStr.split(',')) {
    const eq = pair.indexOf('=');
    if (eq === -1) continue;
    params.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
  }

  return params;
}

// Only the exact string "false" turns a flag off.
function flagEnabled(params: Map<string, string>, key: string): boolean {
  return params.get(key) !== 'false';
}

export function parseHeaderSettings(paramStr: string): HeaderSettings {
  const params = parseParamString(paramStr);

  return {
    readingTime: flagEnabled(params, 'reading_time'),
    submitIssue: flagEnabled(params, 'submit_issue'),
    colabPath: params.get('colab') ?? null,
  };
}
