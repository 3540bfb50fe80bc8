const TAG = /<[^>]*>/g;

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

const ENTITY = /&(?:nbsp|amp|lt|gt|quot|#39);/g;

/** Strip HTML tags and collapse runs of whitespace into single spaces. */
export function cleanHtml(raw: string): string {
  if (!raw) {
    return '';
  }
  const withoutTags = raw.replace(TAG, '');
  const decoded = withoutTags.replace(ENTITY, (entity) => ENTITIES[entity] ?? entity);
  return decoded.split(/\s+/).filter(Boolean).join(' ');
}
