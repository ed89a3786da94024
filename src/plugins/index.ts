// Each plugin registers itself on import
import './dynamodb-export';
import './postgresql';
import './postgresql-stream';

export { createPlugin, listPlugins, registerPlugin } from './registry';
