/**
 * Link Builder Tests
 */

import { describe, it, expect } from 'vitest';

import { LinkBuilder } from '../../../links/link-builder.js';

describe('LinkBuilder', () => {
  const links = new LinkBuilder();

  it('should link definitions to their AzAdvertizer page', () => {
    expect(links.definitionLink('Deploy-MDFC-Config', 'Initiative')).toBe(
      'https://www.azadvertizer.net/azpolicyinitiativesadvertizer/Deploy-MDFC-Config.html'
    );
    expect(links.definitionLink(' p 1 ', 'Policy')).toBe('https://www.azadvertizer.net/azpolicyadvertizer/p%201.html');
  });

  it('should link an assignment to its library template', () => {
    expect(links.assignmentLink('es_root', 'Deploy-MDFC-Config')).toBe(
      'https://github.com/Azure/terraform-azurerm-caf-enterprise-scale/blob/main/modules/archetypes/lib/policy_assignments/policy_assignment_es_deploy_mdfc_config.tmpl.json'
    );
  });

  it('should return an empty link when an input is blank', () => {
    expect(links.definitionLink('  ', 'Policy')).toBe('');
    expect(links.assignmentLink('', 'Deploy-MDFC-Config')).toBe('');
    expect(links.assignmentLink('es_root', ' ')).toBe('');
  });

  it('should use the configured repository location', () => {
    const custom = new LinkBuilder({
      azAdvertizerBase: 'https://mirror.example.test/',
      githubWebBase: 'https://git.example.test',
      repo: 'example/library',
      ref: 'release/1',
      assignmentPath: '/lib/assignments/',
    });

    expect(custom.definitionLink('p1', 'Policy')).toBe('https://mirror.example.test/azpolicyadvertizer/p1.html');
    expect(custom.assignmentLink('corp', 'Deny-Public-IP')).toBe(
      'https://git.example.test/example/library/blob/release%2F1/lib/assignments/policy_assignment_es_deny_public_ip.tmpl.json'
    );
  });
});
