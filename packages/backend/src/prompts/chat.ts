export const NOT_FOUND_IN_DOCUMENT = "I cannot find that information in the provided document";

export function buildAnswerPrompt(context: string, question: string): string {
  return `
You are a helpful AI assistant that answers questions based on the provided document context.
Use the following pieces of context to answer the question at the end.

Context:
${context.length > 0 ? context : "(no relevant passages were found in the document)"}

Question: ${question}

Instructions:
1. Answer the question based ONLY on the provided context
2. If the answer cannot be found in the context, say "${NOT_FOUND_IN_DOCUMENT}"
3. Be concise but comprehensive in your response
4. If relevant, quote specific parts of the document
5. Maintain a helpful and professional tone

Answer:`.trim();
}

export const DOCUMENT_SUMMARY_QUESTION =
  "Please provide a comprehensive summary of this document, including its main topics, key points, and overall purpose.";

export const SUGGESTION_SEED_QUERY = "main topics key points";

export function buildSuggestionPrompt(content: string): string {
  return `
Based on the following document content, suggest 5 relevant questions that a user might ask:

Content:
${content}

Questions should be:
1. Specific to the document content
2. Useful for understanding key information
3. Varied in scope (some detailed, some general)

Format your response as a numbered list.`.trim();
}
