// ── Secret masking ──

export function maskSecrets(text: string, knownSecrets: readonly string[] = []): string {
  let masked = text;
  for (const secret of knownSecrets) {
    if (secret.length > 0) masked = masked.split(secret).join('***');
  }
  return masked
    .replace(/(?:sk-|pk-|token_|ghp_|github_pat_)[a-zA-Z0-9_]{20,}/g, '***')
    .replace(/(?:Bearer|Basic)\s+\S{20,}/g, (m) => m.split(/\s+/)[0] + ' ***')
    .replace(/(?:password|secret|key|token)=\S+/gi, (m) => m.split('=')[0] + '=***');
}
