import { describe, it, expect } from '@jest/globals';
import { HandlebarsEngine } from '../../src/prompts/engine.js';
import { TemplateRenderError } from '../../src/utils/errors.js';

describe('HandlebarsEngine', () => {
  const engine = new HandlebarsEngine();

  it('renders without HTML escaping', () => {
    expect(engine.render('{{persona}}', { persona: '<b>"quoted" & more</b>' })).toBe('<b>"quoted" & more</b>');
  });

  it('renders missing values as empty strings', () => {
    expect(engine.render('[{{missing.value}}]', {})).toBe('[]');
  });

  it('falls back with the default helper', () => {
    expect(engine.render('{{default library "everyone"}}', { library: null })).toBe('everyone');
    expect(engine.render('{{default library "everyone"}}', { library: 'core' })).toBe('core');
  });

  it('treats empty mappings as absent with present', () => {
    const template = '{{#if (present metadata)}}has{{else}}none{{/if}}';
    expect(engine.render(template, { metadata: {} })).toBe('none');
    expect(engine.render(template, { metadata: { a: 1 } })).toBe('has');
  });

  it('joins lists', () => {
    expect(engine.render('{{join tags}}', { tags: ['a', 'b'] })).toBe('a, b');
    expect(engine.render('{{join tags " | "}}', { tags: ['a', 'b'] })).toBe('a | b');
  });

  it('writes metadata as frontmatter', () => {
    expect(engine.render('{{frontmatter metadata}}body', { metadata: { mode: 'agent' } })).toBe(
      '---\nmode: agent\n---\nbody',
    );
    expect(engine.render('{{frontmatter metadata}}body', { metadata: {} })).toBe('body');
  });

  it('renders registered partials', () => {
    const withPartial = new HandlebarsEngine();
    withPartial.registerPartial('footer', '-- {{team}}');
    expect(withPartial.render('end {{> footer}}', { team: 'docs' })).toBe('end -- docs');
  });

  it('reports syntax errors', () => {
    expect(() => engine.render('{{#if open}}never closed', {})).toThrow(TemplateRenderError);
    expect(() => engine.render('{{#if open}}never closed', {})).toThrow(/^Template syntax error: /);
  });

  it('reports rendering failures', () => {
    expect(() => engine.render('{{> missing}}', {})).toThrow(/^Template rendering failed: /);
  });
});
