import nodemailer from 'nodemailer';
import { getSmtpSettings } from '../config/env';
import { EntityKind } from '../models/businessEntity';
import { logger } from '../utils/logger';

export interface EmailOptions {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

/** Sends one message over SMTP. Settings are read per call; rejects on any failure. */
export const sendEmail = async (options: EmailOptions) => {
  const smtp = getSmtpSettings();
  const transporter = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: { user: smtp.user, pass: smtp.pass },
  });

  const info = await transporter.sendMail({
    from: smtp.from,
    to: options.to,
    subject: options.subject,
    text: options.text,
    html: options.html,
  });

  logger.info('Email sent', { messageId: info.messageId, to: options.to });
};

export interface EntityNotification {
  kind: EntityKind;
  entityId: string;
  email?: string;
  subject: string;
  message: string;
}

/** Best effort: failures are logged and never reach the caller. */
export const notifyEntity = async (notification: EntityNotification) => {
  const { kind, entityId, email, subject, message } = notification;
  logger.info('Entity notification', { kind, entityId, subject });

  if (!email) return;

  try {
    await sendEmail({ to: email, subject, text: message });
  } catch (err) {
    logger.warn('Entity notification email failed', {
      kind,
      entityId,
      error: err instanceof Error ? err.message : err,
    });
  }
};
