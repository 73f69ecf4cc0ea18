/**
 * Remembers the fingerprint of the last content this process wrote, so the
 * change it causes on disk is not mistaken for a user edit.
 */
export class SelfWriteGuard {
  private fingerprint: string | null = null;

  recordSelfWrite(fingerprint: string): void {
    this.fingerprint = fingerprint;
  }

  isSelfInducedChange(observedFingerprint: string): boolean {
    return this.fingerprint !== null && this.fingerprint === observedFingerprint;
  }

  /**
   * Checks an observed snapshot and forgets the recorded write either way:
   * once the file has been seen with any content, a later return to the
   * written text is the user's doing.
   */
  consume(observedFingerprint: string): boolean {
    const matched = this.isSelfInducedChange(observedFingerprint);
    this.fingerprint = null;
    return matched;
  }

  lastSelfWrite(): string | null {
    return this.fingerprint;
  }

  clear(): void {
    this.fingerprint = null;
  }
}
