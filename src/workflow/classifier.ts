import { ClassificationFailure } from "../core/errors";
import { bodyText } from "../mailbox/body";
import { cleanText, slugify } from "../pipeline/slug";
import { CandidateMessage, WorkflowSpec } from "../types";

export interface ReleaseTarget {
  releaseId: string;
  folderName: string;
  releaseNumber?: string;
}

export type ClassificationResult = { ok: true; release: ReleaseTarget } | { ok: false; failure: ClassificationFailure };

export interface ClassifyOptions {
  title?: string;
}

const UNSAFE_FOLDER_CHARS = /[\\/:*?"<>|]+/g;

function safeFolderName(value: string): string {
  return cleanText(value).replace(UNSAFE_FOLDER_CHARS, "_");
}

export function renderFolderName(template: string, releaseNumber: string): string {
  return safeFolderName(template.replace(/\{number\}/g, releaseNumber));
}

const PATTERN_LITERAL = /^\/(.+)\/([a-z]*)$/;

/**
 * A pattern written as `/.../flags` keeps its own flags (minus `g` and `y`);
 * a bare pattern matches case-insensitively.
 */
export function compileReleasePattern(pattern: string): RegExp {
  const literal = PATTERN_LITERAL.exec(pattern);
  if (!literal) {
    return new RegExp(pattern, "i");
  }
  return new RegExp(literal[1], literal[2].replace(/[gy]/g, ""));
}

function findReleaseNumber(patterns: string[], texts: string[]): string | undefined {
  for (const pattern of patterns) {
    const regex = compileReleasePattern(pattern);
    for (const text of texts) {
      const match = regex.exec(text);
      if (match) {
        return (match[1] ?? match[0]).trim();
      }
    }
  }
  return undefined;
}

export function classifyRelease(candidate: CandidateMessage, workflow: WorkflowSpec, options: ClassifyOptions = {}): ClassificationResult {
  const rules = workflow.release;
  const subject = cleanText(candidate.subject);

  switch (rules.collectionType) {
    case "playlist": {
      const name = rules.singleReleaseName ?? workflow.name;
      return { ok: true, release: { releaseId: slugify(name), folderName: safeFolderName(name) } };
    }
    case "named_release": {
      const slug = options.title ? slugify(options.title) : "";
      if (!slug) {
        return {
          ok: false,
          failure: new ClassificationFailure(subject, [], "named_release workflows need a release title (--title)"),
        };
      }
      return { ok: true, release: { releaseId: slug, folderName: slug } };
    }
    case "bound_volume": {
      const patterns = rules.fallbackPattern ? [rules.primaryPattern, rules.fallbackPattern] : [rules.primaryPattern];
      const texts = [subject];
      if (rules.searchBody) {
        const body = bodyText(candidate);
        if (body) {
          texts.push(body);
        }
      }

      const releaseNumber = findReleaseNumber(patterns, texts);
      if (releaseNumber === undefined || releaseNumber.length === 0) {
        return { ok: false, failure: new ClassificationFailure(subject, patterns) };
      }
      return {
        ok: true,
        release: {
          releaseId: releaseNumber,
          folderName: renderFolderName(rules.folderTemplate, releaseNumber),
          releaseNumber,
        },
      };
    }
  }
}
