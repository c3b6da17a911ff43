/** Detect MIME type of a delimited-text file from its extension. */
export function detectMimeType(fileNameOrPath: string): string {
  const ext = fileNameOrPath.split('.').pop()?.toLowerCase();
  switch (ext) {
    case 'csv':
      return 'text/csv';
    case 'tsv':
    case 'tab':
      return 'text/tab-separated-values';
    default:
      return 'text/plain';
  }
}
