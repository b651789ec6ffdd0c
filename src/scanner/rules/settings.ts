export interface RuleSettings {
  readonly featurePatterns: readonly RegExp[];
}
