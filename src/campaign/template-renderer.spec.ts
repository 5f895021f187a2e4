import { renderTemplate } from './template-renderer';

describe('renderTemplate', () => {
  it('interpolates with or without inner spaces', () => {
    expect(renderTemplate('Hi {{first_name}}, from {{ sender }}', {
      first_name: 'Jo',
      sender: 'Sam',
    })).toBe('Hi Jo, from Sam');
  });

  it('renders unknown and null keys as empty', () => {
    expect(renderTemplate('[{{ missing }}][{{ nothing }}]', { nothing: null })).toBe('[][]');
  });

  it('does not escape HTML', () => {
    expect(renderTemplate('{{ v }}', { v: '<b>&</b>' })).toBe('<b>&</b>');
  });

  it('picks the branch of a conditional block', () => {
    const template = '{{#if cc}}cc: {{ cc }}{{else}}no cc{{/if}}';

    expect(renderTemplate(template, { cc: 'team@acme.example' })).toBe(
      'cc: team@acme.example',
    );
    expect(renderTemplate(template, { cc: '   ' })).toBe('no cc');
    expect(renderTemplate('{{#if flag}}yes{{/if}}', {})).toBe('');
  });
});
