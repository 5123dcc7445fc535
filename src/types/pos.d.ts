// The pos package ships no type declarations.
declare module 'pos' {
  namespace pos {
    class Tagger {
      /** Tags each token with its Penn Treebank part of speech. */
      tag(words: string[]): Array<[string, string]>
    }
  }

  export = pos
}
