import nodemailer, { type Transporter } from 'nodemailer'
import { env } from '../../env.js'
import { log } from '../../logger.js'

let transporter: Transporter | null = null

/**
 * SMTP when SMTP_HOST is set. Without it messages are rendered by the JSON
 * transport and only logged, which keeps local setups working.
 */
function getTransporter() {
  if (transporter) return transporter
  transporter = env.SMTP_HOST
    ? nodemailer.createTransport({
        host: env.SMTP_HOST,
        port: env.SMTP_PORT,
        secure: env.SMTP_SECURE,
        auth: env.SMTP_USER ? { user: env.SMTP_USER, pass: env.SMTP_PASSWORD } : undefined,
        connectionTimeout: 15000,
        greetingTimeout: 15000,
        socketTimeout: 20000
      })
    : nodemailer.createTransport({ jsonTransport: true })
  return transporter
}

export async function sendMail(args: { to: string; subject: string; text: string }) {
  const startedAt = Date.now()
  const info = await getTransporter().sendMail({
    from: env.DEFAULT_FROM_EMAIL,
    to: args.to,
    subject: args.subject,
    text: args.text
  })
  log('info', 'mail.sent', {
    to: args.to,
    subject: args.subject,
    messageId: info.messageId,
    transport: env.SMTP_HOST ? 'smtp' : 'json',
    durationMs: Date.now() - startedAt
  })
}

export function verificationEmail(args: { firstName: string; link: string; ttlHours: number }) {
  return {
    subject: 'Verify your email address',
    text: [
      `Hello ${args.firstName || 'there'},`,
      '',
      'Thank you for registering. Please confirm your email address by opening the link below:',
      '',
      args.link,
      '',
      `This link expires in ${args.ttlHours} hours.`
    ].join('\n')
  }
}

export function passwordResetEmail(args: { firstName: string; link: string; ttlHours: number }) {
  return {
    subject: 'Reset your password',
    text: [
      `Hello ${args.firstName || 'there'},`,
      '',
      'We received a request to reset your password. Open the link below to choose a new one:',
      '',
      args.link,
      '',
      `This link expires in ${args.ttlHours} hours. If you did not ask for a reset you can ignore this email.`
    ].join('\n')
  }
}
