/**
 * Masking of sensitive evidence before findings leave the process
 */

/**
 * Mask a secret value, keeping only a short prefix
 */
export function maskSecret(
  value: string,
  options: { prefixLength?: number; maskChar?: string } = {}
): string {
  const { prefixLength = 4, maskChar = '*' } = options

  if (value.length <= prefixLength * 2) {
    return maskChar.repeat(value.length)
  }

  const prefix = value.slice(0, prefixLength)
  const maskLength = Math.min(value.length - prefixLength, 8)

  return `${prefix}${maskChar.repeat(maskLength)}[MASKED]`
}

/**
 * Token shapes masked wherever they appear in evidence
 */
export const SECRET_PATTERNS: readonly RegExp[] = [
  /AKIA[0-9A-Z]{16}/g,
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  /[a-zA-Z0-9_-]{32,}/g
]

/**
 * Mask evidence for safe display in reports
 */
export function maskEvidence(evidence: string, patterns: readonly RegExp[] = SECRET_PATTERNS): string {
  if (/^[a-zA-Z0-9_-]{20,}$/.test(evidence)) {
    return maskSecret(evidence)
  }

  let masked = evidence
  for (const pattern of patterns) {
    masked = masked.replace(pattern, match => maskSecret(match))
  }
  return masked
}

/**
 * Mask the evidence field of a finding-like object
 */
export function maskFindingEvidence<T extends { evidence?: string }>(finding: T): T {
  if (!finding.evidence) {
    return finding
  }

  return {
    ...finding,
    evidence: maskEvidence(finding.evidence)
  }
}
