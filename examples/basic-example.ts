import {
  TimeStateMachine,
  TimeDilationSettings,
  FixedTimestepScheduler,
  TimeState,
  TimeStatePriority,
  EventPriority
} from '../src';

// Composition root: one settings object, one machine, passed to whoever needs them
const settings = new TimeDilationSettings({
  scales: { [TimeState.SlowMotion]: 0.25 },
  autoExitTimeouts: { [TimeState.SlowMotion]: 3 }
});
const machine = new TimeStateMachine(settings, { debug: true });

// Simulated world: a projectile moving at 10 units per simulated second
let projectileX = 0;
const scheduler = new FixedTimestepScheduler(machine, (dt) => {
  projectileX += 10 * dt;
});

// Observers
machine.on('enteredTacticalMode', (state) => {
  console.log(`>> tactical mode: ${state}`);
});
machine.on('exitedTacticalMode', (previous) => {
  console.log(`<< back to real time (was ${previous})`);
});
machine.on('autoExitTriggered', () => {
  console.log('!! auto-exit');
}, { priority: EventPriority.High });

// Game loop simulation
function gameLoop(): void {
  const frameDt = 1 / 60; // 60 FPS

  for (let frame = 0; frame < 60 * 6; frame++) {
    if (frame === 30) {
      machine.requestStateChange(TimeState.SlowMotion, TimeStatePriority.Normal, undefined, 'Dodge');
    }
    if (frame === 60) {
      // Low priority request cannot cancel slow motion
      const accepted = machine.requestStateChange(TimeState.RealTime, TimeStatePriority.Low, undefined, 'Ambient');
      console.log(`low priority exit accepted: ${accepted}`);
    }

    scheduler.tick(frameDt);

    if (frame % 60 === 0) {
      console.log(`t=${(frame / 60).toFixed(1)}s ${machine.getDebugInfo()} atb=${machine.getATBTimeMultiplier()} x=${projectileX.toFixed(2)}`);
    }
  }
}

gameLoop();

for (const record of machine.history()) {
  console.log(`${record.fromState} -> ${record.toState} (${record.reason})`);
}
