import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { LANGUAGE_NAMES, type LanguageCode } from '../../repos/userRepo.js'

const localized = z.object({ en: z.string(), es: z.string(), fr: z.string(), ar: z.string(), hi: z.string() })

const templatesSchema = z.object({
  systemPrompt: z.string(),
  notFound: localized,
  emergency: localized
})

const TEMPLATES = templatesSchema.parse(
  JSON.parse(readFileSync(new URL('./promptTemplates.json', import.meta.url), 'utf8'))
)

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December'
]

/** `2024-03-05` -> `March 05, 2024` */
export function formatDiagnosisDate(isoDate: string) {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(isoDate)
  if (!match) return isoDate
  const [, year, month, day] = match
  const name = MONTHS[Number(month) - 1]
  return name ? `${name} ${day}, ${year}` : isoDate
}

export type PatientContext = {
  patientName: string
  doctorName: string | null
  cancerType: string | null
  cancerStage: string | null
  pathologyStage: string | null
  treatment: string | null
  diagnosisDate: string | null
}

export class PromptBuilder {
  readonly language: LanguageCode

  constructor(
    private readonly patient: PatientContext | null,
    language: LanguageCode = 'en'
  ) {
    this.language = language
  }

  private get doctorLabel() {
    return this.patient?.doctorName ? `Dr. ${this.patient.doctorName}` : 'Not yet assigned'
  }

  buildSystemPrompt() {
    let prompt = TEMPLATES.systemPrompt
    if (this.patient) prompt += `\n\n${this.buildPatientContext(this.patient)}`
    if (this.language !== 'en') prompt += `\n\n${this.buildLanguageContext()}`
    return prompt.trim()
  }

  private buildPatientContext(p: PatientContext) {
    const medical: string[] = []
    if (p.cancerType) medical.push(`- Cancer Type: ${p.cancerType}`)
    if (p.cancerStage) medical.push(`- Cancer Stage: ${p.cancerStage}`)
    if (p.pathologyStage) medical.push(`- Pathology Stage: ${p.pathologyStage}`)
    if (p.treatment) medical.push(`- Current Treatment: ${p.treatment}`)
    if (p.diagnosisDate) medical.push(`- Diagnosis Date: ${formatDiagnosisDate(p.diagnosisDate)}`)
    const medicalSection = medical.length > 0 ? medical.join('\n') : '- No specific medical information available'
    const doctor = this.doctorLabel

    return [
      'PATIENT CONTEXT:',
      `- Patient Name: ${p.patientName}`,
      `- Treating Physician: ${doctor}`,
      '',
      'Medical Information:',
      medicalSection,
      '',
      'IMPORTANT GUIDELINES FOR THIS PATIENT:',
      `- Always refer to their doctor as ${doctor}`,
      `- Be aware of their ${p.cancerType ?? 'cancer'} diagnosis when responding`,
      `- If asked about treatments or symptoms not in your knowledge base, direct them to ${doctor}`,
      '- Never reveal their medical information unless they mention it first'
    ].join('\n')
  }

  private buildLanguageContext() {
    const name = LANGUAGE_NAMES[this.language]
    return [
      'LANGUAGE PREFERENCE:',
      `- Preferred language: ${name}`,
      `- Communicate in ${name} when possible`,
      `- Explain medical terms in simple ${name} language`
    ].join('\n')
  }

  /** Retrieval query: the question, prefixed with what we know of the diagnosis. */
  buildQueryPrompt(question: string, organTypeName: string | null) {
    const parts: string[] = []
    if (organTypeName) parts.push(`Cancer Type: ${organTypeName}`)
    if (this.patient?.cancerStage) parts.push(`Stage: ${this.patient.cancerStage}`)
    if (parts.length === 0) return `User Question: ${question}`
    return [
      `Context: ${parts.join(' | ')}`,
      `User Question: ${question}`,
      '',
      'Find information specifically relevant to this cancer type and stage.'
    ].join('\n')
  }

  buildNotFoundResponse(question: string) {
    const doctor = this.patient?.doctorName ? `Dr. ${this.patient.doctorName}` : 'your healthcare provider'
    return TEMPLATES.notFound[this.language].replaceAll('{question}', () => question).replaceAll('{doctor}', () => doctor)
  }

  buildEmergencyResponse() {
    return TEMPLATES.emergency[this.language]
  }
}

export function buildAnswerPrompt(contextChunks: readonly string[], question: string) {
  const context = contextChunks.map((content, i) => `[Document ${i + 1}]\n${content}`).join('\n\n')
  return `Context from knowledge base:\n${context}\n\nUser Question: ${question}`
}
