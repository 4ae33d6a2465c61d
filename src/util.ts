let _id = 0;
export function id(): string {
  return String(_id++);
}

/**
 * Formats a pixel value for logs. Infinite growth limits are common while
 * sizing tracks, so they get a symbol instead of "Infinity".
 */
export function px(value: number): string {
  if (value === Infinity) return '∞';
  return String(Math.round(value * 100) / 100);
}

export class Logger {
  string: string;
  formats: string[]; // only for browsers
  indent: string[];
  lineIsEmpty: boolean;

  constructor() {
    this.string = '';
    this.formats = [];
    this.indent = [];
    this.lineIsEmpty = false;
  }

  private format(ansi: string, css: string) {
    if (typeof process === 'object') {
      this.string += ansi;
    } else {
      this.string += '%c';
      this.formats.push(css);
    }
  }

  bold() {
    this.format('\x1b[1m', 'font-weight: bold');
  }

  underline() {
    this.format('\x1b[4m', 'text-decoration: underline');
  }

  reset() {
    this.format('\x1b[0m', 'font-weight: normal');
  }

  flush() {
    console.log(this.string, ...this.formats);
    this.string = '';
    this.formats = [];
  }

  text(str: string | number) {
    const lines = String(str).split('\n');

    const append = (s: string) => {
      if (s) {
        if (this.lineIsEmpty) this.string += this.indent.join('');
        this.string += s;
        this.lineIsEmpty = false;
      }
    };

    for (let i = 0; i < lines.length; i++) {
      if (i === 0) {
        append(lines[i]);
      } else {
        this.string += '\n';
        this.lineIsEmpty = true;
        append(lines[i]);
      }
    }
  }

  pushIndent(indent = '  ') {
    this.indent.push(indent);
  }

  popIndent() {
    this.indent.pop();
  }
}
