/**
 * Security helpers shared by the HTTP layer and log statements.
 */
export class SecurityUtil {
  /** 32-byte Curve25519 key, base64 with padding. */
  static readonly WIREGUARD_KEY_PATTERN = /^[A-Za-z0-9+/]{42}[AEIMQUYcgkosw480]=$/;

  /**
   * Shorten an address or key for log output: `0x1234…abcd`.
   */
  static mask(value: string, visible = 6): string {
    if (value.length <= visible * 2) {
      return value;
    }
    return `${value.substring(0, visible)}…${value.substring(value.length - 4)}`;
  }

  static isWireGuardPublicKey(value: string): boolean {
    return this.WIREGUARD_KEY_PATTERN.test(value);
  }

  /**
   * Message safe to return for an unexpected error. Internal details
   * only leave the process outside production.
   */
  static sanitizeErrorMessage(error: unknown, isProduction = process.env.NODE_ENV === 'production'): string {
    if (isProduction || !(error instanceof Error)) {
      return 'internal error';
    }
    return error.message;
  }

  /**
   * Mask sensitive fields before a config or payload object is logged
   */
  static maskSensitiveData(
    data: Record<string, unknown>,
    fieldsToMask: string[] = ['operatorPrivateKey', 'privateKey', 'secret'],
  ): Record<string, unknown> {
    const masked = { ...data };
    for (const field of fieldsToMask) {
      const value = masked[field];
      if (typeof value === 'string' && value.length > 0) {
        masked[field] = '***';
      }
    }
    return masked;
  }
}
