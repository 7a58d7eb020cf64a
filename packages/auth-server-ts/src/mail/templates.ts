/**
 * Passcode email content. The code is always digits and the product name is
 * configuration, so nothing here needs HTML escaping beyond the name.
 */
export interface OtpEmailData {
  code: string
  ttlSeconds: number
  productName: string
}

export interface RenderedEmail {
  subject: string
  text: string
  html: string
}

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')

export const expiryMinutes = (ttlSeconds: number): number => Math.max(1, Math.floor(ttlSeconds / 60))

// Shared email styles
const emailStyles = `
  body { font-family: Arial, sans-serif; margin: 0; padding: 20px; background-color: #f4f4f4; }
  .container { max-width: 600px; margin: auto; background: white; padding: 20px; border-radius: 8px; }
  .code { font-size: 32px; letter-spacing: 8px; font-weight: bold; color: #222; text-align: center; margin: 24px 0; }
  .footer { margin-top: 30px; font-size: 14px; color: #777; text-align: center; border-top: 1px solid #eee; padding-top: 15px; }
`

export const renderOtpEmail = ({ code, ttlSeconds, productName }: OtpEmailData): RenderedEmail => {
  const minutes = expiryMinutes(ttlSeconds)
  const name = escapeHtml(productName)

  return {
    subject: `Your verification code (${productName})`,
    text: `Your verification code is: ${code}\nIt expires in ${minutes} minute${minutes === 1 ? '' : 's'}.`,
    html: `<!DOCTYPE html>
<html>
  <head><style>${emailStyles}</style></head>
  <body>
    <div class="container">
      <p>Use this code to continue signing in to ${name}:</p>
      <div class="code">${code}</div>
      <p>It expires in ${minutes} minute${minutes === 1 ? '' : 's'}. If you did not request it, ignore this email.</p>
      <div class="footer">${name}</div>
    </div>
  </body>
</html>`,
  }
}
