export { type DirectoryFixtures, itWithDir, writeTree } from './directory';
