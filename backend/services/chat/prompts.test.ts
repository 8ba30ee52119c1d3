import { describe, expect, it } from 'vitest'
import { PromptBuilder, buildAnswerPrompt, formatDiagnosisDate, type PatientContext } from './prompts.js'

const patient: PatientContext = {
  patientName: 'Maria Lopez',
  doctorName: 'Sam Okafor',
  cancerType: 'Breast - Ductal Carcinoma',
  cancerStage: 'II',
  pathologyStage: 'T2N0M0',
  treatment: 'Chemotherapy',
  diagnosisDate: '2024-03-05'
}

describe('formatDiagnosisDate', () => {
  it('spells out the month', () => {
    expect(formatDiagnosisDate('2024-03-05')).toBe('March 05, 2024')
  })

  it('leaves unparseable input as is', () => {
    expect(formatDiagnosisDate('last spring')).toBe('last spring')
  })
})

describe('PromptBuilder', () => {
  it('adds the patient block to the system prompt', () => {
    const prompt = new PromptBuilder(patient).buildSystemPrompt()
    expect(prompt).toContain('- Treating Physician: Dr. Sam Okafor')
    expect(prompt).toContain('- Diagnosis Date: March 05, 2024')
    expect(prompt).toContain('- Be aware of their Breast - Ductal Carcinoma diagnosis when responding')
    expect(prompt).not.toContain('LANGUAGE PREFERENCE:')
  })

  it('notes the preferred language when it is not English', () => {
    const prompt = new PromptBuilder({ ...patient, doctorName: null }, 'fr').buildSystemPrompt()
    expect(prompt).toContain('- Treating Physician: Not yet assigned')
    expect(prompt).toContain('- Preferred language: French')
  })

  it('prefixes the retrieval query with cancer type and stage', () => {
    expect(new PromptBuilder(patient).buildQueryPrompt('What are side effects?', 'Breast')).toBe(
      'Context: Cancer Type: Breast | Stage: II\n' +
        'User Question: What are side effects?\n\n' +
        'Find information specifically relevant to this cancer type and stage.'
    )
  })

  it('uses the bare question when nothing is known', () => {
    expect(new PromptBuilder(null).buildQueryPrompt('What is a biopsy?', null)).toBe('User Question: What is a biopsy?')
  })

  it('fills the question and doctor into the not-found answer', () => {
    const text = new PromptBuilder(patient).buildNotFoundResponse('costs $1 & more')
    expect(text.startsWith('I apologize, but I don\'t have specific information about "costs $1 & more"')).toBe(true)
    expect(text).toContain('discussing this directly with Dr. Sam Okafor,')
  })

  it('falls back to a generic provider without an assigned doctor', () => {
    const text = new PromptBuilder(null, 'es').buildNotFoundResponse('x')
    expect(text).toContain('directamente con your healthcare provider,')
  })

  it('localizes the emergency response', () => {
    expect(new PromptBuilder(null, 'es').buildEmergencyResponse().startsWith('Entiendo que puede estar')).toBe(true)
  })
})

describe('buildAnswerPrompt', () => {
  it('numbers the context documents', () => {
    expect(buildAnswerPrompt(['alpha', 'beta'], 'Why?')).toBe(
      'Context from knowledge base:\n[Document 1]\nalpha\n\n[Document 2]\nbeta\n\nUser Question: Why?'
    )
  })
})
