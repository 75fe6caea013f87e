export { Data, DEFAULT_TYPE, type DataOptions } from './Data';
export {
  AutoConverter,
  BooleanConverter,
  FieldConverter,
  ListConverter,
  NumberConverter,
  StringConverter,
  createConverter,
  type Converter
} from './converters';
