export {
  DOCUMENT_SUMMARY_QUESTION,
  NOT_FOUND_IN_DOCUMENT,
  SUGGESTION_SEED_QUERY,
  buildAnswerPrompt,
  buildSuggestionPrompt
} from "./chat.js";
