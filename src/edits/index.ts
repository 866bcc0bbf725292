export {
  deleteNode,
  postfixWith,
  prefixWith,
  replaceNode,
  replaceSpan
} from './fix-builders';
export { applyEdits, applyTargetedEdits } from './applier';
export { getNodeSpan, sliceNodeText } from './span';
