export function buildSummaryUserPrompt(text: string, maxLength: number): string {
  return `Summarize this news story in at most ${maxLength} characters:

${text}

Summary:`;
}

export function buildAnswerUserPrompt(context: string, question: string): string {
  return `Context from news highlights:

${context}

---

QUESTION: ${question}

Answer using only the highlights above and cite them as [1], [2].`;
}
