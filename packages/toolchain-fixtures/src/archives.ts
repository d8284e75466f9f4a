import AdmZip from 'adm-zip'

const CENTRAL_HEADER_SIGNATURE = Buffer.from([0x50, 0x4b, 0x01, 0x02])

/** Zip the contents of `sourceDir` (not the directory itself) */
export function packDirectory(sourceDir: string): Buffer {
  const archive = new AdmZip()
  archive.addLocalFolder(sourceDir)
  return archive.toBuffer()
}

export function listArchiveEntries(bytes: Uint8Array): string[] {
  return new AdmZip(Buffer.from(bytes)).getEntries().map((entry) => entry.entryName)
}

/**
 * Copy of a zip whose leading local header is intact but whose first
 * central directory record is not.
 */
export function corruptCentralDirectory(bytes: Uint8Array): Buffer {
  const copy = Buffer.from(bytes)
  const offset = copy.indexOf(CENTRAL_HEADER_SIGNATURE)
  if (offset < 0) {
    throw new Error('Archive has no central directory record')
  }
  copy.fill(0, offset, offset + CENTRAL_HEADER_SIGNATURE.length)
  return copy
}
