import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai'
import { AIMessage, HumanMessage, SystemMessage } from '@langchain/core/messages'
import { env } from '../../env.js'

export type ChatTurn = { role: 'user' | 'assistant'; content: string }

let chatModel: ChatOpenAI | null = null
let embeddings: OpenAIEmbeddings | null = null

function requireApiKey() {
  if (!env.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY is not configured')
  }
  return env.OPENAI_API_KEY
}

export function isLlmConfigured() {
  return Boolean(env.OPENAI_API_KEY)
}

function getChatModel() {
  chatModel ??= new ChatOpenAI({
    apiKey: requireApiKey(),
    model: env.LLM_MODEL,
    maxTokens: env.LLM_MAX_COMPLETION_TOKENS,
    timeout: env.LLM_TIMEOUT_MS,
    temperature: env.LLM_TEMPERATURE
  })
  return chatModel
}

function getEmbeddings() {
  embeddings ??= new OpenAIEmbeddings({
    apiKey: requireApiKey(),
    model: env.EMBEDDING_MODEL,
    timeout: env.LLM_TIMEOUT_MS,
    batchSize: 100
  })
  return embeddings
}

/**
 * One completion: system preamble, prior turns (oldest -> newest), then the
 * prompt for this turn.
 */
export async function generateChatReply(args: {
  systemPrompt: string
  historyOldestToNewest: readonly ChatTurn[]
  prompt: string
}) {
  const lcMessages = [
    new SystemMessage(args.systemPrompt),
    ...args.historyOldestToNewest.map((m) => (m.role === 'user' ? new HumanMessage(m.content) : new AIMessage(m.content))),
    new HumanMessage(args.prompt)
  ]

  const res = await getChatModel().invoke(lcMessages)
  return (res.content ?? '').toString().trim()
}

export function embedQuery(text: string) {
  return getEmbeddings().embedQuery(text)
}

export function embedDocuments(texts: string[]) {
  return getEmbeddings().embedDocuments(texts)
}
