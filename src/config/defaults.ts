// Default classification lists. Directory names match exactly, every other list is compared lowercased.

export const DEFAULT_IGNORED_DIRECTORIES = [
  '.git', '.idea', '.vscode', '.gradle', '.mvn', 'snapshots',
  'target', 'build', 'out', 'node_modules', 'nbproject', 'nbbuild', 'dist', '__pycache__',
]

export const DEFAULT_IGNORED_FILES = [
  'mvnw', 'mvnw.cmd', 'gradlew', 'gradlew.bat',
  'snapshot.json',
  'projsnap.js', 'projsnap.ts',
]

export const DEFAULT_SECRET_PATTERNS = [
  '.env', 'secrets', 'secret', 'credentials', 'keystore', 'key', 'pem', 'p12', 'pfx',
]

export const DEFAULT_BINARY_EXTENSIONS = [
  '.jar', '.class', '.png', '.jpg', '.jpeg', '.gif', '.bmp', '.ico', '.pdf',
  '.zip', '.tar', '.gz', '.rar', '.7z',
  '.mp4', '.mp3', '.wav', '.mov',
  '.exe', '.dll',
]

export const DEFAULT_TEXT_EXTENSIONS = [
  '.java', '.kt', '.kts', '.scala', '.groovy',
  '.py', '.rb', '.go', '.rs',
  '.js', '.jsx', '.ts', '.tsx',
  '.json', '.yml', '.yaml', '.xml', '.properties', '.toml', '.ini', '.gradle',
  '.md', '.txt', '.html', '.htm', '.css',
]

export const DEFAULT_CONTENT_CAP_BYTES = 200 * 1024
export const DEFAULT_TEXT_OUTPUT_CAP_BYTES = 500 * 1024
export const DEFAULT_VCS_TIMEOUT_MS = 30_000
