import { InMemoryEventLog } from '@yield-engine/shared/src/events/event-log';
import { createTestEvent, hoursAgo, REFERENCE_TIME } from '../helpers/testUtils';

describe('InMemoryEventLog', () => {
     const events = [
          createTestEvent({ unitId: 1, quantity: 2, bookedAt: hoursAgo(5) }),
          createTestEvent({ unitId: 2, quantity: 7, bookedAt: hoursAgo(4) }),
          createTestEvent({ unitId: 1, quantity: 3, bookedAt: hoursAgo(30) }),
     ];
     const log = new InMemoryEventLog(events);

     it('should return the events of a unit in chronological order', () => {
          expect(log.eventsFor(1, hoursAgo(48), REFERENCE_TIME).map((e) => e.quantity)).toEqual([3, 2]);
     });

     it('should sum quantities for one unit within a window', () => {
          expect(log.sumQuantities(1, hoursAgo(24), REFERENCE_TIME)).toBe(2);
          expect(log.sumQuantities(1, hoursAgo(48), REFERENCE_TIME)).toBe(5);
          expect(log.sumQuantities(3, hoursAgo(48), REFERENCE_TIME)).toBe(0);
     });

     it('should include both window bounds', () => {
          expect(log.eventsFor(1, hoursAgo(30), hoursAgo(5))).toHaveLength(2);
     });

     it('should not see events added to the source array later', () => {
          const source = [...events];
          const snapshot = new InMemoryEventLog(source);
          source.push(createTestEvent({ unitId: 1, quantity: 9 }));

          expect(snapshot.sumQuantities(1, hoursAgo(48), REFERENCE_TIME)).toBe(5);
     });
});
