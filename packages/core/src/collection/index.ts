export { OrderedDictionary, KEY_FIELD, type DictionaryEntry } from './OrderedDictionary';
