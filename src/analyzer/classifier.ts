import { isUnused } from './usage-analyzer.js';
import { AnalysisError, errorMessage } from './errors.js';
import type { FilePolicy } from './file-policy.js';
import type {
  Classification,
  DeadCodeFinding,
  Definition,
  Liveness,
  Snapshot,
} from './types.js';

/**
 * A definition is dead only when nothing in the scanned codebase references it
 * and it is not part of its module's public surface. Definitions in files the
 * policy excludes are out of scope rather than live.
 */
export function classifyDefinition(definition: Definition, policy: FilePolicy): Liveness {
  if (!policy.shouldAnalyze(definition.filepath)) return 'out-of-scope';
  return isUnused(definition) && !definition.isExported ? 'dead' : 'live';
}

function toFinding(definition: Definition): DeadCodeFinding | null {
  const { name, kind, filepath, sourceText } = definition;
  if (!filepath || !sourceText) return null;
  return { name, kind, filepath, sourceText };
}

/** Classify every definition of a snapshot, in file then declaration order */
export function classifySnapshot(snapshot: Snapshot, policy: FilePolicy): Classification {
  const result: Classification = {
    deadFunctions: [],
    deadClasses: [],
    candidates: [],
    skipped: [],
  };

  for (const file of snapshot.files()) {
    if (!policy.shouldAnalyze(file.path)) continue;

    for (const definition of file.definitions) {
      let finding: DeadCodeFinding | null;
      try {
        if (classifyDefinition(definition, policy) !== 'dead') continue;
        finding = toFinding(definition);
      } catch (err) {
        const error = new AnalysisError(
          `Could not classify ${definition.kind} ${definition.name}: ${errorMessage(err)}`,
          file.path,
          definition.name,
          { cause: err },
        );
        console.warn(`[classify] ${error.message} (${file.path})`);
        result.skipped.push({
          name: definition.name,
          kind: definition.kind,
          filepath: file.path,
          reason: errorMessage(err),
        });
        continue;
      }

      if (!finding) continue;
      result.candidates.push(definition);
      if (finding.kind === 'function') {
        result.deadFunctions.push(finding);
      } else {
        result.deadClasses.push(finding);
      }
    }
  }

  return result;
}
