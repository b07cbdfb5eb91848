export { renderWorkflow, writeWorkflow } from './workflow.js'
