import { ENROLLMENT_FAILURES } from '../session.controller';

describe('enrollment failure responses', () => {
  it('answers 404 for a missing session or student and 409 for a repeated enrollment', () => {
    expect(ENROLLMENT_FAILURES).toEqual({
      session_not_found: { statusCode: 404, message: 'Session not found' },
      student_not_found: { statusCode: 404, message: 'Student not found' },
      already_enrolled: { statusCode: 409, message: 'Student is already enrolled in this session' },
    });
  });
});
