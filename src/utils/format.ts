import { html as htmlBeautify } from 'js-beautify';

export function formatSvg(raw: string): string {
  return htmlBeautify(raw, {
    indent_size: 2,
    wrap_line_length: 0,
    preserve_newlines: false,
    max_preserve_newlines: 1,
    wrap_attributes: 'auto',
    content_unformatted: ['text', 'tspan'],
  });
}
