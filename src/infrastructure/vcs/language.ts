const LANGUAGES: Record<string, string> = {
  js: 'JavaScript', ts: 'TypeScript', jsx: 'JavaScript (React)',
  tsx: 'TypeScript (React)', py: 'Python', java: 'Java',
  rb: 'Ruby', php: 'PHP', go: 'Go', cs: 'C#',
  cpp: 'C++', c: 'C', rs: 'Rust', swift: 'Swift',
  kt: 'Kotlin', sh: 'Shell', yml: 'YAML', yaml: 'YAML',
  json: 'JSON', md: 'Markdown', sql: 'SQL', tf: 'Terraform',
  html: 'HTML', css: 'CSS', scss: 'SCSS',
};

/** Language tag from the file extension, undefined when unknown. */
export function detectLanguage(filePath: string): string | undefined {
  const name = filePath.split('/').pop() ?? '';
  const dot = name.lastIndexOf('.');
  if (dot <= 0) return undefined;
  return LANGUAGES[name.slice(dot + 1).toLowerCase()];
}
