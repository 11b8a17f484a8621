import type { RunOutcome } from '../../runner.js';
import type { Classification } from '../../classify/classifier.js';
import type { ChangeRange } from '../../model/change.js';

export function formatOutcomeJson(outcome: RunOutcome): string {
  if (outcome.status === 'unchanged') {
    return JSON.stringify({
      status: outcome.status,
      reason: outcome.reason,
      range: outcome.range,
    }, null, 2);
  }

  return JSON.stringify({
    status: outcome.status,
    written: outcome.written,
    range: outcome.range,
    versionType: outcome.record.versionType,
    oldVersion: outcome.record.oldVersion,
    newVersion: outcome.record.newVersion,
    prDetected: outcome.record.prDetected,
    rule: outcome.classification.rule,
    matchedFiles: outcome.classification.matchedFiles,
    files: outcome.changeSet.files,
  }, null, 2);
}

export function formatClassificationJson(range: ChangeRange, files: string[], classification: Classification): string {
  return JSON.stringify({
    range,
    bump: classification.bump,
    rule: classification.rule,
    matchedFiles: classification.matchedFiles,
    files,
  }, null, 2);
}
