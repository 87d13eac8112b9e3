/**
 * Audit Trail System
 * Tracks specification encodings and verification runs under a label
 */

import type { Specification } from "../../src/specification";

export interface AuditEntry {
  timestamp: string;
  type: "specification_encoded" | "verification_passed" | "verification_failed";
  label: string;
  details: Record<string, unknown>;
}

export interface EncodingAudit {
  label: string;
  limit: number;
  bits: string;
  encodedAt: string;
}

export interface VerificationAudit {
  label: string;
  total: number;
  consistent: number;
  mismatches: number[];
  consistencyRatio: number;
  verifiedAt: string;
}

export class AuditLog {
  private entries: AuditEntry[] = [];
  private encodingAudits: Map<string, EncodingAudit[]> = new Map();
  private verificationAudits: Map<string, VerificationAudit[]> = new Map();

  /**
   * Record a finished encoding
   */
  recordEncoding(label: string, specification: Specification): EncodingAudit {
    const now = new Date().toISOString();
    const audit: EncodingAudit = {
      label,
      limit: specification.length,
      bits: specification.toHex(),
      encodedAt: now,
    };

    const audits = this.encodingAudits.get(label) ?? [];
    audits.push(audit);
    this.encodingAudits.set(label, audits);

    this.entries.push({
      timestamp: now,
      type: "specification_encoded",
      label,
      details: { limit: audit.limit, bits: audit.bits },
    });
    return audit;
  }

  /**
   * Record the per-test-case results of one verification run
   */
  recordVerification(label: string, results: readonly boolean[]): VerificationAudit {
    const now = new Date().toISOString();
    const mismatches: number[] = [];
    results.forEach((consistent, index) => {
      if (!consistent) {
        mismatches.push(index);
      }
    });

    const total = results.length;
    const audit: VerificationAudit = {
      label,
      total,
      consistent: total - mismatches.length,
      mismatches,
      consistencyRatio: total > 0 ? (total - mismatches.length) / total : 1,
      verifiedAt: now,
    };

    const audits = this.verificationAudits.get(label) ?? [];
    audits.push(audit);
    this.verificationAudits.set(label, audits);

    this.entries.push({
      timestamp: now,
      type: mismatches.length === 0 ? "verification_passed" : "verification_failed",
      label,
      details: { total, mismatches: mismatches.length, firstMismatch: mismatches[0] },
    });
    return audit;
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEncodingAudits(label: string): EncodingAudit[] {
    return this.encodingAudits.get(label) ?? [];
  }

  /**
   * Verification audits for one label, or for every label when omitted
   */
  getVerificationAudits(label?: string): VerificationAudit[] {
    if (label === undefined) {
      return Array.from(this.verificationAudits.values()).flat();
    }
    return this.verificationAudits.get(label) ?? [];
  }

  /**
   * Get summary statistics
   */
  getSummary(): {
    totalEntries: number;
    totalEncodings: number;
    totalVerifications: number;
    passedVerifications: number;
    passRate: number;
  } {
    const verifications = this.getVerificationAudits();
    const passed = verifications.filter(v => v.mismatches.length === 0).length;
    const total = verifications.length;

    return {
      totalEntries: this.entries.length,
      totalEncodings: Array.from(this.encodingAudits.values()).reduce((sum, audits) => sum + audits.length, 0),
      totalVerifications: total,
      passedVerifications: passed,
      passRate: total > 0 ? passed / total : 0,
    };
  }

  toJSON(): {
    entries: AuditEntry[];
    encodingAudits: Record<string, EncodingAudit[]>;
    verificationAudits: Record<string, VerificationAudit[]>;
  } {
    return {
      entries: this.entries,
      encodingAudits: Object.fromEntries(this.encodingAudits),
      verificationAudits: Object.fromEntries(this.verificationAudits),
    };
  }

  clear(): void {
    this.entries = [];
    this.encodingAudits.clear();
    this.verificationAudits.clear();
  }
}

/**
 * Global audit log instance
 */
export const globalAuditLog = new AuditLog();
