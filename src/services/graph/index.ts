export {
  Neo4jGraphStore,
  type GraphStore,
  type GraphSession,
  type GraphEdgeRow,
  type TopicTitlesRow,
} from './store.js';
export { GraphContextBuilder, type GraphContextOptions } from './context-builder.js';
