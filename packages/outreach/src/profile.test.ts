import { describe, expect, it } from 'vitest';

import {
  buildRecipientProfileText,
  extractEmailFromProfile,
  extractEmailFromText,
  profileJsonToText,
} from './profile.js';

const PROFILE = [
  {
    business_email: [],
    current_employers: [
      {
        employer_name: 'Acme',
        employer_company_website_domain: ['acme.test'],
        business_emails: {
          'dana.old@acme.test': { verification_status: 'unverified' },
          'dana@acme.test': { verification_status: 'verified' },
        },
      },
    ],
    past_employers: [
      {
        employer_name: 'Globex',
        business_emails: { 'dana@globex.test': { verification_status: 'verified' } },
      },
    ],
  },
];

describe('extractEmailFromProfile', () => {
  it('prefers the first business email', () => {
    const raw = JSON.stringify([{ ...PROFILE[0], business_email: ['dana.reyes@acme.test'] }]);

    expect(extractEmailFromProfile(raw)).toBe('dana.reyes@acme.test');
  });

  it('falls back to the first verified current employer address', () => {
    expect(extractEmailFromProfile(JSON.stringify(PROFILE))).toBe('dana@acme.test');
  });

  it('falls back to past employers when no current address is verified', () => {
    const raw = JSON.stringify([{ ...PROFILE[0], current_employers: [{ employer_name: 'Acme' }] }]);

    expect(extractEmailFromProfile(raw)).toBe('dana@globex.test');
  });

  it('returns null when the profile has no usable address', () => {
    expect(extractEmailFromProfile(JSON.stringify([{ current_employers: [] }]))).toBeNull();
    expect(extractEmailFromProfile('[]')).toBeNull();
  });

  it('scans plain text when the profile is not JSON', () => {
    expect(extractEmailFromProfile('Reach me at dana@acme.test any time')).toBe('dana@acme.test');
    expect(extractEmailFromText('no address here')).toBeNull();
  });
});

describe('profileJsonToText', () => {
  it('summarizes employment history', () => {
    const raw = JSON.stringify([{ ...PROFILE[0], business_email: ['dana.reyes@acme.test'] }]);

    expect(profileJsonToText(raw)).toBe(
      [
        'LinkedIn Profile Summary:',
        '  Business Email: dana.reyes@acme.test',
        '  Current Employment:',
        '    - Acme',
        '      Website: acme.test',
        '  Past Employment:',
        '    - Globex',
        '',
      ].join('\n'),
    );
  });

  it('returns raw text unchanged when it is not JSON', () => {
    expect(profileJsonToText('Dana Reyes, CTO at Acme')).toBe('Dana Reyes, CTO at Acme');
  });

  it('returns an empty string for an empty profile list', () => {
    expect(profileJsonToText('[]')).toBe('');
  });
});

describe('buildRecipientProfileText', () => {
  it('lists the recipient fields and the optional LinkedIn URL', () => {
    expect(
      buildRecipientProfileText({
        name: 'Dana Reyes',
        title: 'CTO',
        companyName: 'Acme',
        linkedinProfileUrl: 'https://www.linkedin.com/in/dana-reyes',
      }),
    ).toBe(
      'LinkedIn Profile Summary:\n  Name: Dana Reyes\n  Title: CTO\n  Company: Acme\n  LinkedIn: https://www.linkedin.com/in/dana-reyes\n',
    );
    expect(buildRecipientProfileText({ name: 'Dana Reyes', title: 'CTO', companyName: 'Acme' })).not.toContain(
      'LinkedIn:',
    );
  });
});
