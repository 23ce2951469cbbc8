/**
 * Conversion Tracker
 * Unified tracking for batch counters and issues
 */

import { ZodError } from "zod";
import { describeError } from "./describe-error";

// ============================================================================
// Types
// ============================================================================

export type DocumentIssueReason =
  | "malformed-ir"
  | "processing-error"
  | "extraction-failed"
  | "cancelled";
export type LinkIssueReason = "unresolved-link" | "anchor-not-found";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error"
  | "write-error";

// Discriminated union - each type has its own subset of reasons
export interface DocumentIssue {
  type: "document";
  path: string;
  reason: DocumentIssueReason;
  details?: string;
}

export interface LinkIssue {
  type: "link";
  path: string; // Document containing the link
  target: string;
  reason: LinkIssueReason;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = DocumentIssue | LinkIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Document counts
  totalDocuments: number;
  resolvedDocuments: number;
  failedDocuments: number;
  cancelledDocuments: number;

  // Asset counts
  relocatedImages: number;
  missingImages: number;

  // Link counts
  resolvedLinks: number;
  externalLinks: number;
  unresolvedLinks: number;
  brokenAnchors: number;

  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(
  error: unknown,
  context: "read" | "write",
): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: describeError(error, "invalid schema"),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return {
    reason: context === "write" ? "write-error" : "read-error",
    details: describeError(error),
  };
}

function mapDocumentError(error: unknown): IssueInfo<DocumentIssueReason> {
  return {
    reason: error instanceof ZodError ? "malformed-ir" : "processing-error",
    details: describeError(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalDocuments = 0;
  private resolvedDocuments = 0;
  private failedDocuments = 0;
  private cancelledDocuments = 0;
  private relocatedImages = 0;
  private missingImages = 0;
  private resolvedLinks = 0;
  private externalLinks = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalDocuments(count: number): void {
    this.totalDocuments = count;
  }

  incrementResolved(): void {
    this.resolvedDocuments++;
  }

  incrementFailed(): void {
    this.failedDocuments++;
  }

  // A resolved document whose output could not be written
  markResolvedAsFailed(): void {
    this.resolvedDocuments--;
    this.failedDocuments++;
  }

  addRelocatedImages(count: number): void {
    this.relocatedImages += count;
  }

  addMissingImages(count: number): void {
    this.missingImages += count;
  }

  incrementLinksResolved(): void {
    this.resolvedLinks++;
  }

  incrementExternalLinks(): void {
    this.externalLinks++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackDocumentError(path: string, error: unknown): void {
    const { reason, details } = mapDocumentError(error);
    this.issues.push({ type: "document", path, reason, details });
  }

  trackExtractionFailure(path: string, details: string): void {
    this.issues.push({
      type: "document",
      path,
      reason: "extraction-failed",
      details,
    });
  }

  trackCancelled(path: string): void {
    this.cancelledDocuments++;
    this.issues.push({ type: "document", path, reason: "cancelled" });
  }

  trackLinkIssue(path: string, target: string, reason: LinkIssueReason): void {
    this.issues.push({ type: "link", path, target, reason });
  }

  trackResourceError(
    path: string,
    error: unknown,
    context: "read" | "write" = "read",
  ): void {
    const { reason, details } = mapResourceError(error, context);
    this.issues.push({ type: "resource", path, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();
    const linkIssues = this.getIssues("link");

    return {
      totalDocuments: this.totalDocuments,
      resolvedDocuments: this.resolvedDocuments,
      failedDocuments: this.failedDocuments,
      cancelledDocuments: this.cancelledDocuments,
      relocatedImages: this.relocatedImages,
      missingImages: this.missingImages,
      resolvedLinks: this.resolvedLinks,
      externalLinks: this.externalLinks,
      unresolvedLinks: linkIssues.filter((i) => i.reason === "unresolved-link")
        .length,
      brokenAnchors: linkIssues.filter((i) => i.reason === "anchor-not-found")
        .length,
      issues: this.issues,
      duration,
    };
  }

  /**
   * Stats grouped for export (stats.json)
   */
  exportStats(): {
    summary: Omit<ProcessingStats, "issues">;
    issues: Record<IssueType, Record<string, Issue[]>>;
  } {
    const { issues, ...summary } = this.getStats();
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      document: {},
      link: {},
      resource: {},
    };

    for (const issue of issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    return { summary, issues: grouped };
  }
}
