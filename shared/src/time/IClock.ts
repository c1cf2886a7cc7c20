/**
 * Clock abstraction so date-dependent argument repair can be tested deterministically.
 */
export interface IClock {
    now(): Date
}

export class SystemClock implements IClock {
    now(): Date {
        return new Date()
    }
}

/**
 * Test clock with controllable time.
 */
export class FakeClock implements IClock {
    private currentTime: Date

    constructor(initialTime: Date = new Date('2026-01-31T12:00:00.000Z')) {
        this.currentTime = new Date(initialTime)
    }

    now(): Date {
        return new Date(this.currentTime)
    }

    advance(ms: number): void {
        this.currentTime = new Date(this.currentTime.getTime() + ms)
    }

    setTime(time: Date): void {
        this.currentTime = new Date(time)
    }
}
