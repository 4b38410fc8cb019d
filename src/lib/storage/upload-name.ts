const PDF_EXT = '.pdf'
const MAX_STEM_LENGTH = 120
const FALLBACK_STEM = 'file'

export type UploadName = {
  sanitized: string
  changed: boolean
}

export function isPdfFileName(name: string) {
  return String(name || '').toLowerCase().endsWith(PDF_EXT)
}

// Runs of anything but ASCII letters, digits, dot, dash and underscore collapse to one `_`.
function cleanStem(stem: string) {
  return stem
    .normalize('NFKD')
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._-]+|[._-]+$/g, '')
}

/**
 * Upload filename → name stored under the session directory.
 *
 * Only the last path segment is used, so `../x.pdf` and `C:\dir\x.pdf`
 * both become `x.pdf`. A `.pdf` extension survives, lower-cased.
 */
export function sanitizeUploadName(name: string): UploadName {
  const original = String(name || '')
  const segments = original.split(/[\\/]/)
  const base = segments[segments.length - 1] ?? ''

  const pdf = isPdfFileName(base)
  const stem = pdf ? base.slice(0, -PDF_EXT.length) : base
  const cleaned = cleanStem(stem).slice(0, MAX_STEM_LENGTH).replace(/[._-]+$/, '') || FALLBACK_STEM

  const sanitized = pdf ? cleaned + PDF_EXT : cleaned
  return { sanitized, changed: sanitized !== original }
}
