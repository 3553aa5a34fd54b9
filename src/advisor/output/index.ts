export { formatConsole, formatJson, formatRecommendation, toJsonObject, humanizeAgentName } from './formatter';
