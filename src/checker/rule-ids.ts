export const RuleId = {
  DoubleSpaces: "double-spaces",
  RepeatedWords: "repeated-words",
  MissingSpaceAfterPunct: "missing-space-after-punct",
  SpaceBeforePunct: "space-before-punct",
  UnclosedBrackets: "unclosed-brackets",
  TrailingWhitespace: "trailing-whitespace",
  MultipleBlankLines: "multiple-blank-lines",
  InconsistentQuotes: "inconsistent-quotes",
  TabCharacters: "tab-characters",
  DoubleHyphenEmdash: "double-hyphen-emdash",
  HiddenCharacters: "hidden-characters",
  StraightVsCurlyQuotes: "straight-vs-curly-quotes",
} as const;

export type RuleId = (typeof RuleId)[keyof typeof RuleId];
