/**
 * Zip packing and unpacking for artifact bundles and calibration uploads
 */

import AdmZip from 'adm-zip'
import { createInvalidCalibrationDataError, type AppError } from '@npu-latency/errors'

const LOCAL_FILE_SIGNATURE = 0x04034b50
const EMPTY_ARCHIVE_SIGNATURE = 0x06054b50

/** Builds the error raised for bytes that cannot be unpacked */
export type InvalidArchiveError = (cause?: Error) => AppError

const invalidCalibrationArchive: InvalidArchiveError = (cause) =>
  cause
    ? createInvalidCalibrationDataError(`Calibration archive is corrupted: ${cause.message}`, {
        cause,
      })
    : createInvalidCalibrationDataError()

function readArchive(bytes: Uint8Array): AdmZip | undefined {
  if (bytes.byteLength < 4) {
    return undefined
  }
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const signature = buffer.readUInt32LE(0)
  if (signature !== LOCAL_FILE_SIGNATURE && signature !== EMPTY_ARCHIVE_SIGNATURE) {
    return undefined
  }
  try {
    return new AdmZip(buffer)
  } catch {
    // Signature matched but the end of central directory is unreadable
    return undefined
  }
}

export function isZipArchive(bytes: Uint8Array): boolean {
  return readArchive(bytes) !== undefined
}

/**
 * Extract every entry into `targetDir` and return the extracted file names.
 * Bytes that are not a zip, or a zip whose directory or entries cannot be
 * read, raise the error built by `invalid` (INVALID_CALIBRATION_DATA unless
 * given).
 */
export function extractArchive(
  bytes: Uint8Array,
  targetDir: string,
  invalid: InvalidArchiveError = invalidCalibrationArchive
): string[] {
  const archive = readArchive(bytes)
  if (!archive) {
    throw invalid()
  }
  try {
    archive.extractAllTo(targetDir, true)
    return archive
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.entryName)
  } catch (error) {
    throw invalid(error instanceof Error ? error : new Error(String(error)))
  }
}

export function packDirectoryTo(sourceDir: string, archivePath: string): void {
  const archive = new AdmZip()
  archive.addLocalFolder(sourceDir)
  archive.writeZip(archivePath)
}
