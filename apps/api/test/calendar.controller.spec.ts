import { Test } from '@nestjs/testing';
import { CalendarController } from '../src/calendar/calendar.controller';
import { CalendarService } from '../src/calendar/calendar.service';

describe('CalendarController (integration)', () => {
  const monthView = {
    bandId: 'band-1',
    year: 2025,
    month: 7,
    source: 'cache',
    cachedAt: 1,
    events: [],
    markers: {}
  };

  const calendarServiceMock = {
    getMonth: jest.fn().mockResolvedValue(monthView),
    getDay: jest.fn().mockResolvedValue({ bandId: 'band-1', date: '2025-07-10', events: [] }),
    refresh: jest.fn().mockResolvedValue({ bandId: 'band-1', invalidatedMonths: 2, cachedMonths: 3 })
  };

  async function controller() {
    const moduleRef = await Test.createTestingModule({
      controllers: [CalendarController],
      providers: [{ provide: CalendarService, useValue: calendarServiceMock }]
    }).compile();

    return moduleRef.get(CalendarController);
  }

  beforeEach(() => jest.clearAllMocks());

  it('forwards month requests to the service layer', async () => {
    const response = await (await controller()).month({ bandId: 'band-1', year: 2025, month: 7 });

    expect(response).toEqual(monthView);
    expect(calendarServiceMock.getMonth).toHaveBeenCalledWith('band-1', 2025, 7);
  });

  it('forwards day requests', async () => {
    await (await controller()).day({ bandId: 'band-1', dayKey: '2025-07-10' });
    expect(calendarServiceMock.getDay).toHaveBeenCalledWith('band-1', '2025-07-10');
  });

  it('forwards refresh requests', async () => {
    const response = await (await controller()).refresh({ bandId: 'band-1' });

    expect(response).toEqual({ bandId: 'band-1', invalidatedMonths: 2, cachedMonths: 3 });
    expect(calendarServiceMock.refresh).toHaveBeenCalledTimes(1);
  });
});
