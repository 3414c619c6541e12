const DANGEROUS_PATTERNS: RegExp[] = [
  /\bsudo\b/,
  /\brm\s+-[a-zA-Z]*(?:rf|fr|Rf|fR)[a-zA-Z]*\b/,
  /\brm\s+-r\s+-f\b|\brm\s+-f\s+-r\b/,
  /\bmkfs(?:\.\w+)?\b/,
  /\bdd\s+if=/,
  /\b(?:shutdown|reboot|halt|poweroff)\b/,
  /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/,
  /\|\s*(?:ba|z|k|da)?sh\b/,
  /\bchmod\s+(?:-R\s+)?0?777\s+\//,
  /\bchown\s+-R\b/,
  />\s*\/dev\/(?:sd|nvme|hd)/,
  /\bcurl\b[^|]*\|\s*\w*sh\b/,
  /\bwget\b[^|]*\|\s*\w*sh\b/
];

const SYSTEM_PATH_PATTERN = /(?:^|[\s=>'"])\/(?:etc|usr|var|sys|proc|boot|bin|sbin|dev|lib|root)(?:\/|\s|$)/;

/**
 * True when a command should not be run on the user's behalf: privilege
 * escalation, recursive deletes, disk formatting, piping into a shell, or
 * anything touching system directories.
 */
export function isDangerousCommand(command: string): boolean {
  const trimmed = command.trim();
  if (!trimmed) {
    return false;
  }
  if (DANGEROUS_PATTERNS.some(pattern => pattern.test(trimmed))) {
    return true;
  }
  return SYSTEM_PATH_PATTERN.test(trimmed);
}
