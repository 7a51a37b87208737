/**
 * Tests for the PHP and Ruby import extractors.
 */
import { describe, it, expect } from 'vitest';
import { PhpExtractor } from '../../../src/extractors/php.js';
import { RubyExtractor } from '../../../src/extractors/ruby.js';

describe('PhpExtractor', () => {
  const extractor = new PhpExtractor();

  it('should extract use declarations, group use and includes', () => {
    const source = [
      '<?php',
      'namespace App\\Http;',
      '',
      'use App\\Models\\User;',
      'use App\\Services\\{AuthService, MailService as Mailer};',
      'use function App\\Helpers\\format_date;',
      '# use Commented\\Thing;',
      '#[Attribute]',
      "require_once 'config.php';",
      'include "helpers.php";',
    ].join('\n');

    expect(extractor.extract(source)).toEqual([
      'App\\Models\\User',
      'App\\Services\\AuthService',
      'App\\Services\\MailService',
      'App\\Helpers\\format_date',
      'config.php',
      'helpers.php',
    ]);
  });

  it('should preserve heredoc and nowdoc bodies as literals', () => {
    const source = [
      '<?php',
      '$sql = <<<SQL',
      'use Fake\\Thing;',
      "require 'fake.php';",
      'SQL;',
      "$raw = <<<'TXT'",
      "    include 'also-fake.php';",
      '    TXT;',
      "require 'real.php';",
    ].join('\n');

    expect(extractor.extract(source)).toEqual(['real.php']);
  });

  it('should split comma-separated use declarations', () => {
    expect(extractor.extract('<?php\nuse App\\A, App\\B as Bee;\n')).toEqual(['App\\A', 'App\\B']);
  });
});

describe('RubyExtractor', () => {
  const extractor = new RubyExtractor();

  it('should extract require, load and autoload forms', () => {
    const source = [
      "require 'json'",
      'require_relative "lib/helper"',
      'require("net/http")',
      "autoload :Parser, 'app/parser'",
      "# require 'commented'",
      '=begin',
      "require 'in_block_comment'",
      '=end',
      'load "tasks.rb"',
    ].join('\n');

    expect(extractor.extract(source)).toEqual(['json', 'lib/helper', 'net/http', 'app/parser', 'tasks.rb']);
  });

  it('should preserve heredoc bodies and interpolations as non-statements', () => {
    const source = [
      'SQL = <<~SQL',
      "  require 'in_heredoc'",
      'SQL',
      `puts "#{require 'inline'}"`,
      "require 'after_heredoc'",
    ].join('\n');

    expect(extractor.extract(source)).toEqual(['after_heredoc']);
  });

  it('should leave shift operators in code', () => {
    const source = ['items << value', 'flags = mask <<2', "require 'still_found'"].join('\n');

    expect(extractor.extract(source)).toEqual(['still_found']);
  });
});
