export type { Scalar, Section, SectionObject, SectionValue } from './section';
export {
  EMPTY_SECTION,
  isScalar,
  isScalarList,
  isSection,
  section,
  sectionFromEntries,
  sectionToObject
} from './section';

export type {
  AttributeValue,
  ExpectPattern,
  Handle,
  HandleAttributes,
  HandleFactory
} from '../handles/types';
