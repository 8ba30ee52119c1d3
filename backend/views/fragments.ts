import type { AuditLog } from '../repos/auditRepo.js'
import type { ChatMessage } from '../repos/chatRepo.js'
import type { DoctorAssignmentRequest } from '../repos/medicalRepo.js'
import type { PageInfo } from '../db/pagination.js'
import { summarizeChanges } from '../services/audit.js'

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
}

export function escapeHtml(value: string) {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
}

/** Escaped text with newlines kept as <br>. */
function multiline(text: string) {
  return escapeHtml(text).replace(/\n/g, '<br>')
}

function time(d: Date) {
  return `<time datetime="${d.toISOString()}">${d.toISOString().slice(11, 16)}</time>`
}

export function chatMessage(message: ChatMessage) {
  const feedback =
    message.role === 'assistant'
      ? `<div class="message-feedback" data-message-id="${escapeHtml(message.id)}"></div>`
      : ''
  return (
    `<div class="chat-message ${message.role}-message" id="message-${escapeHtml(message.id)}">` +
    `<div class="message-content">${multiline(message.content)}</div>` +
    `<div class="message-meta">${time(message.createdAt)}</div>` +
    feedback +
    `</div>`
  )
}

export function sessionMessages(messages: readonly ChatMessage[]) {
  if (messages.length === 0) return '<div class="chat-empty">No messages yet.</div>'
  return messages.map(chatMessage).join('')
}

export function doctorRequests(requests: readonly DoctorAssignmentRequest[]) {
  if (requests.length === 0) return '<p class="empty">No pending doctor requests.</p>'
  const items = requests
    .map(
      (r) =>
        `<li class="doctor-request" data-request-id="${escapeHtml(r.id)}">` +
        `<span class="patient">${escapeHtml(r.patientName || r.patientEmail)}</span>` +
        ` requested <span class="doctor">Dr. ${escapeHtml(r.doctorName)}</span>` +
        ` ${time(r.requestedAt)}</li>`
    )
    .join('')
  return `<ul class="doctor-requests">${items}</ul>`
}

export function auditLogRows(logs: readonly AuditLog[], pagination: PageInfo) {
  const rows = logs
    .map(
      (entry) =>
        `<tr data-log-id="${escapeHtml(entry.id)}">` +
        `<td>${escapeHtml(entry.timestamp.toISOString())}</td>` +
        `<td>${escapeHtml(entry.userEmail ?? 'System')}</td>` +
        `<td>${escapeHtml(entry.action)}</td>` +
        `<td>${escapeHtml(entry.modelName)}</td>` +
        `<td>${escapeHtml(entry.objectId)}</td>` +
        `<td>${escapeHtml(summarizeChanges(entry))}</td>` +
        `</tr>`
    )
    .join('')
  const body = rows || '<tr><td colspan="6">No audit logs found.</td></tr>'
  return (
    `<tbody id="audit-log-rows">${body}</tbody>` +
    `<div class="pagination" data-page="${pagination.page}" data-total-pages="${pagination.totalPages}"></div>`
  )
}
