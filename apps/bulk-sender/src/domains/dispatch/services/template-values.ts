import type { RecipientRecord } from "../model/recipient.model"
import type { TemplateValues } from "./template-renderer"

/** Placeholder values for one recipient, under English and Spanish names. */
export function templateValues(recipient: RecipientRecord, fromName: string): TemplateValues {
  return {
    email: recipient.email,
    name: recipient.name,
    company: recipient.company,
    city: recipient.city,
    custom_message: recipient.customMessage,
    attachment_name: recipient.attachmentName,
    from_name: fromName,

    nombre: recipient.name,
    empresa: recipient.company,
    ciudad: recipient.city,
    mensaje_personalizado: recipient.customMessage,
    nombre_pdf: recipient.attachmentName,
  }
}
