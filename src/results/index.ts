export { ResultsContainer, ResultsContainerOptions, ResultCategory, RESULT_CATEGORIES } from './ResultsContainer'
export { renderDiff, DiffOptions } from './DiffRenderer'
export { ResultsReporter, ReportMode } from './ResultsReporter'
export { ChangeApplier, AppliedChanges } from './ChangeApplier'
export { buildPatch, writePatch, PATCH_FILE_NAME } from './PatchWriter'
