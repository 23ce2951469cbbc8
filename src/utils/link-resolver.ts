import path from "node:path";
import type {
  ConversionContext,
  LinkLike,
  LinkResolutionResult,
  LinkSource,
  LinksConfig,
} from "../types";
import type { Tracker } from "./tracker";
import type { LinkRegistry, LinkRegistryEntry } from "./link-registry";
import { findMatchingSlug } from "./find-matching-slug";
import { isExternalUrl } from "./is-external-url";
import { slugify } from "./slugify";

interface SlugIndex {
  slugTable: LinkRegistryEntry["slugTable"];
  slugs: string[];
}

/**
 * Split a reference into its path and fragment
 * An explicit anchor field wins over a #fragment in the reference.
 */
function splitRef(link: LinkLike): { target: string; anchor?: string } {
  const hash = link.targetRef.indexOf("#");
  const target = hash === -1 ? link.targetRef : link.targetRef.slice(0, hash);
  const fragment = hash === -1 ? "" : link.targetRef.slice(hash + 1);
  const anchor = link.anchor || fragment;
  return { target, anchor: anchor ? decodeFragment(anchor) : undefined };
}

function decodeFragment(fragment: string): string {
  try {
    return decodeURIComponent(fragment);
  } catch {
    return fragment;
  }
}

/**
 * Reference as written in the source, used in warnings
 */
function describeRef(link: LinkLike): string {
  if (link.anchor && !link.targetRef.includes("#")) {
    return `${link.targetRef}#${link.anchor}`;
  }
  return link.targetRef;
}

/**
 * Rewrites internal links against the sealed link registry
 * One instance serves the whole Phase 2; it only reads shared state.
 */
export class LinkResolver {
  private config: LinksConfig;
  private tracker: Tracker;
  private registry: LinkRegistry;

  constructor(ctx: ConversionContext) {
    if (!ctx.links.sealed) {
      throw new Error(
        "Cannot create LinkResolver: link registry is still open. " +
          "Every document must finish Phase 1 before links are resolved.",
      );
    }

    this.config = ctx.config.links;
    this.tracker = ctx.tracker;
    this.registry = ctx.links;
  }

  /**
   * Resolve one link of a document
   * Unresolvable links come back unchanged (with resolved = false) plus a warning.
   *
   * @example
   * // "a.docx" links to "b.docx#Install Steps"
   * resolver.resolve(link, source).link // { targetRef: "b.md", anchor: "install-steps", resolved: true }
   */
  resolve<T extends LinkLike>(
    link: T,
    source: LinkSource,
  ): LinkResolutionResult<T> {
    if (isExternalUrl(link.targetRef)) {
      this.tracker.incrementExternalLinks();
      return { link, status: "external" };
    }

    if (!this.config.resolveInternal) {
      return { link, status: "skipped" };
    }

    const { target, anchor } = splitRef(link);

    // Same-document anchor (#Heading)
    if (!target) {
      return this.resolveOwnAnchor(link, source, anchor);
    }

    const entry = this.registry.findTarget(target, source.sourcePath);
    if (!entry) {
      return this.unresolved(link, source, "unresolved-link");
    }

    const targetRef = this.relativeOutputPath(source.outputPath, entry.outputPath);
    this.tracker.incrementLinksResolved();

    if (!anchor) {
      return {
        link: { ...link, targetRef, anchor: undefined, resolved: true },
        status: "resolved",
      };
    }

    const slug = this.matchAnchor(anchor, entry);
    if (slug) {
      return {
        link: { ...link, targetRef, anchor: slug, resolved: true },
        status: "resolved",
      };
    }

    // Target found but the heading is not: keep the document link, drop the anchor
    const ref = describeRef(link);
    this.tracker.trackLinkIssue(source.sourcePath, ref, "anchor-not-found");
    return {
      link: { ...link, targetRef, anchor: undefined, resolved: true },
      status: "anchor-not-found",
      warning: `anchor not found in target document: ${ref}`,
    };
  }

  private resolveOwnAnchor<T extends LinkLike>(
    link: T,
    source: LinkSource,
    anchor: string | undefined,
  ): LinkResolutionResult<T> {
    if (!anchor) {
      return this.unresolved(link, source, "unresolved-link");
    }

    const slug = this.matchAnchor(anchor, source);
    if (!slug) {
      return this.unresolved(link, source, "anchor-not-found");
    }

    this.tracker.incrementLinksResolved();
    return {
      link: { ...link, targetRef: "", anchor: slug, resolved: true },
      status: "resolved",
    };
  }

  private unresolved<T extends LinkLike>(
    link: T,
    source: LinkSource,
    reason: "unresolved-link" | "anchor-not-found",
  ): LinkResolutionResult<T> {
    const ref = describeRef(link);
    this.tracker.trackLinkIssue(source.sourcePath, ref, reason);
    return {
      link,
      status: reason,
      warning:
        reason === "unresolved-link"
          ? `unresolved internal link: ${ref}`
          : `anchor not found in target document: ${ref}`,
    };
  }

  /**
   * Pick the target heading slug for an anchor
   * Priority: heading text, heading text ignoring case, slug, fuzzy slug match
   */
  private matchAnchor(anchor: string, index: SlugIndex): string | null {
    if (Object.hasOwn(index.slugTable, anchor)) {
      return index.slugTable[anchor];
    }

    const lower = anchor.toLowerCase();
    for (const [text, slug] of Object.entries(index.slugTable)) {
      if (text.toLowerCase() === lower) return slug;
    }

    if (index.slugs.includes(anchor)) {
      return anchor;
    }

    const normalized = this.normalizeAnchor(anchor);
    if (!normalized) return null;

    const match = findMatchingSlug(
      normalized,
      index.slugs,
      this.config.maxMatchStep,
    );
    return match?.slug ?? null;
  }

  /**
   * Normalize an anchor to slug form (splits camelCase: "InstallSteps" → "install-steps")
   */
  private normalizeAnchor(anchor: string): string {
    return slugify(anchor.replace(/(\p{Ll})(\p{Lu})/gu, "$1-$2"));
  }

  /**
   * Target output path as seen from the linking document's directory
   */
  private relativeOutputPath(fromOutput: string, toOutput: string): string {
    return path.posix.relative(path.posix.dirname(fromOutput), toOutput);
  }
}
