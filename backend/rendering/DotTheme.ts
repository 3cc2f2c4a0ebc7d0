export type DotThemeName = 'light' | 'dark';

export type DotTheme = {
  name: DotThemeName;
  /** Header lines; `{top}` and `{title}` are substituted. */
  header: readonly string[];
  /** Font color of the "edit" edge labels. */
  editColor: string;
  /** Fill of assets with issues and of placeholder nodes. */
  errorColor: string;
};

const DARK_STROKE = '#808080';
const DARK_TEXT = '#808080';

export const LIGHT_THEME: DotTheme = Object.freeze({
  name: 'light',
  header: Object.freeze([
    'digraph Assets {',
    '  graph [rankdir=LR, concentrate=true, URL="{top}index.html"',
    '       label="{title}", fontname=FreeSans, tooltip=" "]',
    '  node [fontname=FreeSans, fontsize=10]',
    '  edge [fontname=FreeSans, fontsize=10]',
  ]),
  editColor: '#c0c0c0',
  errorColor: 'pink',
});

export const DARK_THEME: DotTheme = Object.freeze({
  name: 'dark',
  header: Object.freeze([
    'digraph Assets {',
    '  graph [rankdir=LR, concentrate=true, URL="{top}index.html"',
    '         label="{title}", fontname=FreeSans, tooltip=" ",',
    '         bgcolor=black]',
    `  node [fontname=FreeSans, fontsize=10, color="${DARK_STROKE}", fontcolor="${DARK_TEXT}"]`,
    `  edge [fontname=FreeSans, fontsize=10, color="${DARK_STROKE}"]`,
  ]),
  editColor: '#303030',
  errorColor: '#200000',
});

export const isDotThemeName = (value: unknown): value is DotThemeName => value === 'light' || value === 'dark';

export const themeByName = (name: DotThemeName): DotTheme => (name === 'dark' ? DARK_THEME : LIGHT_THEME);
