import { describe, expect, it } from 'vitest'
import { chatMessage, doctorRequests, escapeHtml, sessionMessages } from './fragments.js'

const at = new Date('2026-03-10T12:05:00Z')

describe('escapeHtml', () => {
  it('escapes markup and quotes', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;')
  })
})

describe('chatMessage', () => {
  it('renders an assistant message with a feedback slot', () => {
    expect(chatMessage({ id: 'm1', sessionId: 's1', role: 'assistant', content: 'a <b>\nc', createdAt: at })).toBe(
      '<div class="chat-message assistant-message" id="message-m1">' +
        '<div class="message-content">a &lt;b&gt;<br>c</div>' +
        '<div class="message-meta"><time datetime="2026-03-10T12:05:00.000Z">12:05</time></div>' +
        '<div class="message-feedback" data-message-id="m1"></div>' +
        '</div>'
    )
  })

  it('leaves the feedback slot off user messages', () => {
    expect(chatMessage({ id: 'm2', sessionId: 's1', role: 'user', content: 'hi', createdAt: at })).toBe(
      '<div class="chat-message user-message" id="message-m2">' +
        '<div class="message-content">hi</div>' +
        '<div class="message-meta"><time datetime="2026-03-10T12:05:00.000Z">12:05</time></div>' +
        '</div>'
    )
  })
})

describe('empty states', () => {
  it('shows placeholders when there is nothing to list', () => {
    expect(sessionMessages([])).toBe('<div class="chat-empty">No messages yet.</div>')
    expect(doctorRequests([])).toBe('<p class="empty">No pending doctor requests.</p>')
  })
})
