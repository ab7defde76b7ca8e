import { resolveScheduleRange } from './schedule-range'

describe('resolveScheduleRange', () => {
  // a Wednesday
  const today = '2025-02-12'

  it('resolves single days', () => {
    expect(resolveScheduleRange('TODAY', today)).toEqual({ from: '2025-02-12', to: '2025-02-12' })
    expect(resolveScheduleRange('TOMORROW', today)).toEqual({ from: '2025-02-13', to: '2025-02-13' })
  })

  it('resolves Monday to Sunday weeks', () => {
    expect(resolveScheduleRange('CURRENT-WEEK', today)).toEqual({ from: '2025-02-10', to: '2025-02-16' })
    expect(resolveScheduleRange('NEXT-WEEK', today)).toEqual({ from: '2025-02-17', to: '2025-02-23' })
    expect(resolveScheduleRange('CURRENT-WEEK', '2025-02-16')).toEqual({ from: '2025-02-10', to: '2025-02-16' })
  })

  it('resolves the calendar month', () => {
    expect(resolveScheduleRange('CURRENT-MONTH', today)).toEqual({ from: '2025-02-01', to: '2025-02-28' })
    expect(resolveScheduleRange('CURRENT-MONTH', '2024-12-31')).toEqual({ from: '2024-12-01', to: '2024-12-31' })
  })
})
