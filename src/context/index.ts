export {
  COMFORT_WINDOW_TOKENS,
  REPLY_RESERVE_TOKENS,
  estimateTokens,
  estimateMessageTokens,
  estimateMessagesTokens,
  trimConversation,
  type BudgetReport,
  type TrimResult,
} from "./budget.js";
