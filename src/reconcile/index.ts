export { listResults, ListResultsDeps } from './listResults'
export { ReconcileContext, parseInput, sessionFor, listResultsFor, formatOutcome } from './context'
