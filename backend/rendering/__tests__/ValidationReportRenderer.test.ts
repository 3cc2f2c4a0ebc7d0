import { makeAsset } from '../../../tests/helpers/inventoryFixtures';
import { IssueReport } from '../../validation/IssueReport';
import { issue } from '../../validation/ValidationIssue';
import { renderIssueCounts, renderValidationReport } from '../ValidationReportRenderer';

describe('renderValidationReport', () => {
  const assets = [
    makeAsset('srv_1', 'physical/server', [], { name: 'Web server' }),
    makeAsset('psvc_1', 'physical/server/service', ['srv_1'], { filePath: '/inv/services.yaml' }),
    makeAsset('zzz_1', 'vm/kvm'),
  ];

  test('prints one block per asset with issues, in input order', () => {
    const issues = new IssueReport();
    issues.set('zzz_1', [
      issue('ERROR', 'UNKNOWN_ASSET_TYPE', 'Has unknown type vm/kvm'),
      issue('NOTE', 'TYPE_CHECKS_SKIPPED', 'Skipped 4 type-dependent checks for unknown type'),
    ]);
    issues.set('psvc_1', [
      issue('WARNING', 'MISSING_REQUIRED_DEPENDENCY_TYPE', "'physical/server/service' should define 'storage/.*' dependency"),
    ]);

    expect(renderValidationReport(assets, issues)).toBe(
      [
        "ASSET: psvc_1 'psvc_1'",
        '       in /inv/services.yaml',
        "    WARNING: 'physical/server/service' should define 'storage/.*' dependency",
        '',
        "ASSET: zzz_1 'zzz_1'",
        '       in /inv/assets.yaml',
        '    ERROR: Has unknown type vm/kvm',
        '    NOTE: Skipped 4 type-dependent checks for unknown type',
      ].join('\n'),
    );
    expect(renderIssueCounts(issues)).toBe('ERROR: 1, WARNING: 1, NOTE: 1');
  });

  test('a clean inventory renders nothing', () => {
    const issues = new IssueReport();
    expect(renderValidationReport(assets, issues)).toBe('');
    expect(renderIssueCounts(issues)).toBe('No issues');
  });
});
