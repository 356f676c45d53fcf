/**
 * Paper trading exports.
 */

export {
  createPaperCapabilities,
  DEFAULT_PAPER_MARKETS,
  DEFAULT_PAPER_PRICES,
  PAPER_EXCHANGE_ID,
  PaperOptionsSchema,
  parsePaperOptions,
  type PaperCapabilities,
  type PaperOptions,
} from "./capabilities";
