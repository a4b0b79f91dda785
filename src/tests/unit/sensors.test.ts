import { describe, it, vitest, beforeEach, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Duration, Effect, Exit, Layer, TestClock } from "effect";
import { PriceCoordinatorLayer } from "../../coordinator/index.js";
import { PriceCoordinator } from "../../coordinator/types.js";
import type { IEventLogger } from "../../event-logger/types.js";
import { PriceRepository, TransportError, type IPriceRepository } from "../../price-repository/types.js";
import { readSensors, selectSensors, SENSOR_DESCRIPTIONS, UnknownSensorError } from "../../sensors/index.js";
import { hourlySeries, TODAY_MARKET_PRICES } from "../fixtures/price-series.js";

describe('sensors', () => {
    describe('selectSensors', () => {
        it('should describe every statistic for both commodities', () => {
            expect(SENSOR_DESCRIPTIONS).toHaveLength(76);
            expect(SENSOR_DESCRIPTIONS.find(({ key }) => key === 'gas_today_avg')).toEqual({
                key: 'gas_today_avg',
                name: 'Gas average price today (all-in)',
                commodity: 'gas',
                statistic: 'today_avg',
                unit: 'EUR/m³',
                precision: 3,
            });
        });

        it('should only describe gas day averages for gas', () => {
            expect(SENSOR_DESCRIPTIONS.filter(({ commodity }) => commodity === 'electricity')).toHaveLength(34);
            expect(SENSOR_DESCRIPTIONS.find(({ key }) => key === 'elec_today_before6am_avg')).toBeUndefined();
            expect(SENSOR_DESCRIPTIONS.find(({ key }) => key === 'gas_tomorrow_after6am_avg')).toEqual({
                key: 'gas_tomorrow_after6am_avg',
                name: 'Gas average price tomorrow from 6:00 (all-in)',
                commodity: 'gas',
                statistic: 'tomorrow_after6am_avg',
                unit: 'EUR/m³',
                precision: 3,
                timeline: { window: 'tomorrowAfter6am', component: 'total' },
            });
        });

        it('should attach the market timeline to the current market price', () => {
            expect(SENSOR_DESCRIPTIONS.find(({ key }) => key === 'elec_current_hour_market')?.timeline)
                .toEqual({ window: 'all', component: 'market' });
        });

        it.effect('should expose every sensor when nothing is selected', () =>
            Effect.gen(function* () {
                const sensors = yield* selectSensors([]);

                expect(sensors).toBe(SENSOR_DESCRIPTIONS);
            })
        );

        it.effect('should ignore blank entries', () =>
            Effect.gen(function* () {
                const sensors = yield* selectSensors([' elec_current_hour ', '', 'gas_hour_count']);

                expect(sensors.map(({ key }) => key)).toEqual(['elec_current_hour', 'gas_hour_count']);
                expect(sensors[1].unit).toBe('h');
                expect(sensors[1].precision).toBe(0);
            })
        );

        it.effect('should fail on an unknown sensor key', () =>
            Effect.gen(function* () {
                const result = yield* Effect.exit(selectSensors(['elec_current_hour', 'elec_yesterday_avg']));

                expect(result).toEqual(Exit.fail(new UnknownSensorError({ key: 'elec_yesterday_avg' })));
            })
        );

        it('should name the unknown key in the error message', () => {
            expect(new UnknownSensorError({ key: 'water_today_avg' }).message)
                .toBe('Unknown sensor key "water_today_avg" in display options');
        });
    });

    describe('readSensors', () => {
        const repositoryMock: MockedObject<IPriceRepository> = {
            fetch: vitest.fn(),
        };

        const eventLoggerMock: MockedObject<IEventLogger> = {
            onCommodityUpdated: vitest.fn(),
            onCommodityRefreshFailed: vitest.fn(),
            onTomorrowUnavailable: vitest.fn(),
        };

        const today = hourlySeries('2026-03-10T00:00:00Z', TODAY_MARKET_PRICES);

        const coordinatorLayer = PriceCoordinatorLayer(
            {
                timeZone: 'UTC',
                tomorrowPublicationHourUtc: 13,
                stalenessThreshold: Duration.hours(2),
                retry: { times: 0, baseDelay: Duration.millis(1) },
            },
            eventLoggerMock
        ).pipe(Layer.provide(Layer.succeed(PriceRepository, repositoryMock)));

        beforeEach(() => {
            vitest.clearAllMocks();
            repositoryMock.fetch.mockReturnValue(Effect.succeed(today));
            eventLoggerMock.onCommodityUpdated.mockReturnValue(Effect.void);
            eventLoggerMock.onCommodityRefreshFailed.mockReturnValue(Effect.void);
            eventLoggerMock.onTomorrowUnavailable.mockReturnValue(Effect.void);
        });

        it.effect('should round values to the precision of each sensor', () =>
            Effect.gen(function* () {
                yield* TestClock.setTime(Date.parse('2026-03-10T10:30:00Z'));
                const coordinator = yield* PriceCoordinator;
                yield* coordinator.refresh();
                const sensors = yield* selectSensors([
                    'elec_current_hour',
                    'elec_today_avg',
                    'elec_current_hour_market_percent_tax',
                    'elec_hour_count',
                ]);

                const snapshot = yield* readSensors(coordinator, sensors);

                expect(snapshot.readAt.toISOString()).toBe('2026-03-10T10:30:00.000Z');
                expect(snapshot.readings.map(({ key, value, unit }) => ({ key, value, unit }))).toEqual([
                    { key: 'elec_current_hour', value: 0.28, unit: 'EUR/kWh' },
                    { key: 'elec_today_avg', value: 0.276, unit: 'EUR/kWh' },
                    { key: 'elec_current_hour_market_percent_tax', value: 14, unit: '%' },
                    { key: 'elec_hour_count', value: 24, unit: 'h' },
                ]);
                expect(snapshot.readings.every(({ available, stale }) => available && !stale)).toBe(true);
            }).pipe(Effect.provide(coordinatorLayer))
        );

        it.effect('should report unavailable sensors as null', () =>
            Effect.gen(function* () {
                yield* TestClock.setTime(Date.parse('2026-03-10T10:30:00Z'));
                const coordinator = yield* PriceCoordinator;
                yield* coordinator.refresh();
                const sensors = yield* selectSensors(['elec_tomorrow_min']);

                const snapshot = yield* readSensors(coordinator, sensors);

                expect(snapshot.readings).toEqual([
                    {
                        key: 'elec_tomorrow_min',
                        name: 'Electricity lowest price tomorrow (all-in)',
                        unit: 'EUR/kWh',
                        value: null,
                        available: false,
                        stale: false,
                    },
                ]);
            }).pipe(Effect.provide(coordinatorLayer))
        );

        it.effect('should flag readings of a commodity whose refresh failed as stale', () =>
            Effect.gen(function* () {
                yield* TestClock.setTime(Date.parse('2026-03-10T10:30:00Z'));
                const coordinator = yield* PriceCoordinator;
                yield* coordinator.refresh();

                repositoryMock.fetch.mockImplementation((commodity) =>
                    commodity === 'gas'
                        ? Effect.fail(new TransportError({ message: 'ETIMEDOUT' }))
                        : Effect.succeed(today)
                );
                yield* coordinator.refresh();
                const sensors = yield* selectSensors(['elec_current_hour', 'gas_current_hour']);

                const snapshot = yield* readSensors(coordinator, sensors);

                expect(snapshot.commodities.gas.state).toBe('Stale');
                expect(snapshot.readings.map(({ key, available, stale }) => ({ key, available, stale }))).toEqual([
                    { key: 'elec_current_hour', available: true, stale: false },
                    { key: 'gas_current_hour', available: true, stale: true },
                ]);
            }).pipe(Effect.provide(coordinatorLayer))
        );

        it.effect('should split gas prices at the start of the gas day', () =>
            Effect.gen(function* () {
                yield* TestClock.setTime(Date.parse('2026-03-10T10:30:00Z'));
                const coordinator = yield* PriceCoordinator;
                yield* coordinator.refresh();
                const sensors = yield* selectSensors([
                    'gas_today_before6am_avg',
                    'gas_today_before6am_hour_count',
                    'gas_today_after6am_avg',
                    'gas_today_after6am_hour_count',
                    'gas_tomorrow_before6am_avg',
                ]);

                const snapshot = yield* readSensors(coordinator, sensors);

                expect(snapshot.readings.map(({ key, value, unit }) => ({ key, value, unit }))).toEqual([
                    { key: 'gas_today_before6am_avg', value: 0.225, unit: 'EUR/m³' },
                    { key: 'gas_today_before6am_hour_count', value: 6, unit: 'h' },
                    { key: 'gas_today_after6am_avg', value: 0.293, unit: 'EUR/m³' },
                    { key: 'gas_today_after6am_hour_count', value: 18, unit: 'h' },
                    { key: 'gas_tomorrow_before6am_avg', value: null, unit: 'EUR/m³' },
                ]);
                expect(snapshot.readings[0].timeline?.map(({ from }) => from.toISOString())).toEqual([
                    '2026-03-10T00:00:00.000Z',
                    '2026-03-10T01:00:00.000Z',
                    '2026-03-10T02:00:00.000Z',
                    '2026-03-10T03:00:00.000Z',
                    '2026-03-10T04:00:00.000Z',
                    '2026-03-10T05:00:00.000Z',
                ]);
                expect(snapshot.readings[4].timeline).toEqual([]);
            }).pipe(Effect.provide(coordinatorLayer))
        );

        it.effect('should attach the timeline of the sensor window and component', () =>
            Effect.gen(function* () {
                yield* TestClock.setTime(Date.parse('2026-03-10T10:30:00Z'));
                const coordinator = yield* PriceCoordinator;
                yield* coordinator.refresh();
                const sensors = yield* selectSensors(['elec_upcoming_avg', 'elec_upcoming_avg_market', 'elec_today_min']);

                const snapshot = yield* readSensors(coordinator, sensors);
                const [upcoming, upcomingMarket, todayMin] = snapshot.readings;

                expect(upcoming.timeline).toHaveLength(14);
                expect(upcoming.timeline?.[0].from.toISOString()).toBe('2026-03-10T10:00:00.000Z');
                expect(upcoming.timeline?.[0].price).toBeCloseTo(0.28, 10);
                expect(upcomingMarket.timeline?.map(({ price }) => price)).toEqual(TODAY_MARKET_PRICES.slice(10));
                expect(todayMin.timeline).toBeUndefined();
            }).pipe(Effect.provide(coordinatorLayer))
        );
    });
});
