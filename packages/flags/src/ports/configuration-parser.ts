import type { Configuration } from "./configuration"

export interface ConfigurationParser {
  /** Parses the payload into configurations, preserving payload order. */
  parseConfigurations(text: string): readonly Configuration[]
}
