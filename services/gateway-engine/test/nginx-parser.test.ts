import { describe, expect, it } from 'vitest';

import { NginxSyntaxError } from '../src/core/errors.js';
import { parseNginxConfig } from '../src/gateway/nginx-parser.js';

describe('parseNginxConfig', () => {
  it('builds a tree of directives and blocks', () => {
    const tree = parseNginxConfig(
      ['events {}', 'http {', '  server {', '    listen 80;', '  }', '}'].join('\n'),
    );

    expect(tree).toEqual([
      { name: 'events', args: [], line: 1, block: [] },
      {
        name: 'http',
        args: [],
        line: 2,
        block: [
          {
            name: 'server',
            args: [],
            line: 3,
            block: [{ name: 'listen', args: ['80'], line: 4 }],
          },
        ],
      },
    ]);
  });

  it('unquotes strings and keeps semicolons inside them', () => {
    const [directive] = parseNginxConfig(
      'add_header Strict-Transport-Security "max-age=31536000; includeSubDomains" always;',
    );

    expect(directive?.args).toEqual(['Strict-Transport-Security', 'max-age=31536000; includeSubDomains', 'always']);
  });

  it('handles escapes, empty strings and comments', () => {
    const tree = parseNginxConfig(
      ['# leading comment', 'return 200 "say \\"hi\\"";  # trailing', "'' close;"].join('\n'),
    );

    expect(tree).toEqual([
      { name: 'return', args: ['200', 'say "hi"'], line: 2 },
      { name: '', args: ['close'], line: 3 },
    ]);
  });

  it('reads ${name} as part of a word rather than a block', () => {
    const [directive] = parseNginxConfig('ssl_certificate /etc/letsencrypt/live/${NODE_HOST}/fullchain.pem;');

    expect(directive).toEqual({
      name: 'ssl_certificate',
      args: ['/etc/letsencrypt/live/${NODE_HOST}/fullchain.pem'],
      line: 1,
    });
  });

  it('reports a directive that is not terminated', () => {
    expect(() => parseNginxConfig('server {\n  listen 80\n}')).toThrowError(
      new NginxSyntaxError('Directive "listen" is not terminated by ";"', 2),
    );
  });

  it('reports unbalanced braces and unterminated strings', () => {
    expect(() => parseNginxConfig('server {\n  listen 80;\n')).toThrowError(
      'Block "server" is not closed (line 1)',
    );
    expect(() => parseNginxConfig('listen 80;\n}')).toThrowError('Unexpected "}" (line 2)');
    expect(() => parseNginxConfig('{ listen 80; }')).toThrowError('Unexpected "{" (line 1)');
    expect(() => parseNginxConfig("add_header X 'open;\n")).toThrowError('Unterminated string (line 1)');
  });
});
