export { FunctionProvider } from './adapter.js';
export { FunctionErrorClassifier } from './classifier.js';
