import test from 'node:test';
import assert from 'node:assert/strict';
import { redactPhoneNumbers } from '../../../services/worker-service/src/domain/redaction/redact-phone-numbers';

test('each phone number shape is replaced by the marker', () => {
  assert.equal(redactPhoneNumbers('Call 555-0199 now'), 'Call [REDACTED] now');
  assert.equal(redactPhoneNumbers('Office 555-123-4567.'), 'Office [REDACTED].');
  assert.equal(redactPhoneNumbers('Desk (555) 987-6543 ext'), 'Desk [REDACTED] ext');
  assert.equal(redactPhoneNumbers('Desk (555)987-6543'), 'Desk [REDACTED]');
});

test('longer shapes win over the seven-digit rule at the same position', () => {
  // The seven-digit rule alone would leave "[REDACTED]567" and "(555) [REDACTED]".
  assert.equal(redactPhoneNumbers('555-123-4567'), '[REDACTED]');
  assert.equal(redactPhoneNumbers('(555) 123-4567'), '[REDACTED]');
});

test('decimal digits from other scripts are redacted too', () => {
  assert.equal(redactPhoneNumbers('رقم ٥٥٥-٠١٩٩ هنا'), 'رقم [REDACTED] هنا');
  assert.equal(redactPhoneNumbers('(५५५) १२३-४५६७'), '[REDACTED]');
});

test('every match in the text is replaced', () => {
  assert.equal(
    redactPhoneNumbers('a 555-1234, b 555-987-6543 and c (555) 222-3333'),
    'a [REDACTED], b [REDACTED] and c [REDACTED]',
  );
});

test('text without phone numbers is returned unchanged', () => {
  for (const text of ['', 'no numbers here', 'version 1.2.3', '12-34', 'order 55-1234']) {
    assert.equal(redactPhoneNumbers(text), text);
  }
});

test('redaction is idempotent', () => {
  const once = redactPhoneNumbers('Call 555-0199 or (555) 123-4567');
  assert.equal(redactPhoneNumbers(once), once);
});
