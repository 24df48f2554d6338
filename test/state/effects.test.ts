import { expect } from 'chai';

import {
  NotFoundError,
  PersistenceError,
  ValidationError,
} from '../../src/lib/errors';
import { MemoryTaskStore } from '../../src/persistence/MemoryTaskStore';
import type {
  TaskPersistence,
  TaskResult,
} from '../../src/persistence/types';
import {
  addTask,
  deleteTask,
  loadTasks,
  selectTask,
  setTheme,
  tasksLoaded,
  toggleCompletion,
  updateTask,
} from '../../src/state/actions';
import { createAppStore } from '../../src/state/createAppStore';
import { failureToError } from '../../src/state/effects';
import type { AppState, Task } from '../../src/state/types';
import {
  StubPersistence,
  deferred,
  makeTask,
  silentLogger,
} from '../helpers/fixtures';

const newAppStore = (persistence: TaskPersistence) =>
  createAppStore({ persistence, logger: silentLogger() });

describe('Task effects', () => {
  describe('LOAD_TASKS', () => {
    it('should load tasks and dispatch TASKS_LOADED', async () => {
      const persistence = new StubPersistence();
      const loaded = deferred<Task[]>();
      persistence.onLoad = () => loaded.promise;
      const store = newAppStore(persistence);
      const seen: AppState[] = [];
      store.subscribe((_previous, next) => seen.push(next));

      await store.dispatch(loadTasks());
      expect(store.state.loading).to.be.true;

      loaded.resolve([makeTask(1), makeTask(2)]);
      await store.settled();

      expect(persistence.calls).to.deep.equal(['load']);
      expect(store.state.loading).to.be.false;
      expect(store.state.tasks).to.have.length(2);
      expect(store.state.currentTaskId).to.equal(1);
      expect(seen.map(state => state.loading)).to.deep.equal([true, false]);
    });

    it('should surface load failures through the error field', async () => {
      const persistence = new StubPersistence();
      persistence.onLoad = () => Promise.reject(new Error('disk unavailable'));
      const store = newAppStore(persistence);

      await store.dispatch(loadTasks());
      await store.settled();

      expect(store.state.error).to.equal('disk unavailable');
      expect(store.state.loading).to.be.false;
    });
  });

  describe('SAVE_TASKS', () => {
    it('should create the task and reload to pick up its id', async () => {
      const persistence = new MemoryTaskStore();
      const store = newAppStore(persistence);

      await store.dispatch(addTask({ title: 'Write tests' }));
      expect(store.state.tasks[0].id).to.be.null;

      await store.settled();
      expect(store.state.tasks).to.have.length(1);
      expect(store.state.tasks[0].id).to.equal(1);
      expect(store.state.tasks[0].title).to.equal('Write tests');
      expect(store.state.currentTaskId).to.equal(1);
      expect(await persistence.load()).to.have.length(1);
    });

    it('should report rejected drafts and withdraw them', async () => {
      const persistence = new MemoryTaskStore();
      const store = newAppStore(persistence);

      await store.dispatch(addTask({ title: '   ' }));
      expect(store.state.tasks).to.have.length(1);
      await store.settled();

      expect(store.state.error).to.equal('Title cannot be empty');
      expect(store.state.tasks).to.deep.equal([]);
      expect(await persistence.load()).to.deep.equal([]);
    });

    it('should withdraw drafts when the collaborator throws', async () => {
      const persistence = new StubPersistence();
      persistence.onAdd = () => Promise.reject(new Error('disk full'));
      const store = newAppStore(persistence);
      await store.dispatch(tasksLoaded([makeTask(1)]));

      await store.dispatch(addTask({ title: 'Lost' }));
      await store.settled();

      expect(persistence.calls).to.deep.equal(['addTask Lost']);
      expect(store.state.error).to.equal('disk full');
      expect(store.state.tasks).to.deep.equal([makeTask(1)]);
    });

    it('should store updates and keep the saved record', async () => {
      let now = new Date('2024-05-01T10:00:00.000Z');
      const persistence = new MemoryTaskStore({ now: () => now });
      await persistence.addTask({ title: 'Draft' });
      const store = newAppStore(persistence);
      await store.dispatch(loadTasks());
      await store.settled();

      now = new Date('2024-05-02T08:30:00.000Z');
      await store.dispatch(updateTask(1, { title: 'Final' }));
      expect(store.state.tasks[0].title).to.equal('Final');
      await store.settled();

      expect(store.state.tasks[0].modifiedAt).to.equal(
        '2024-05-02T08:30:00.000Z'
      );
      const [stored] = await persistence.load();
      expect(stored.title).to.equal('Final');
    });

    it('should delete through the collaborator', async () => {
      const persistence = new MemoryTaskStore();
      await persistence.addTask({ title: 'Obsolete' });
      const store = newAppStore(persistence);
      await store.dispatch(loadTasks());
      await store.settled();

      await store.dispatch(deleteTask(1));
      await store.settled();

      expect(store.state.tasks).to.deep.equal([]);
      expect(store.state.error).to.be.null;
      expect(await persistence.load()).to.deep.equal([]);
    });

    it('should report deleting a missing task', async () => {
      const store = newAppStore(new MemoryTaskStore());

      await store.dispatch(deleteTask(42));
      await store.settled();

      expect(store.state.error).to.equal('Task with ID 42 not found');
    });
  });

  describe('TOGGLE_COMPLETION', () => {
    it('should merge the timestamp set by the collaborator', async () => {
      let now = new Date('2024-05-01T10:00:00.000Z');
      const memory = new MemoryTaskStore({ now: () => now });
      await memory.addTask({ title: 'Ship it' });
      const gate = deferred<void>();
      const persistence = new StubPersistence();
      persistence.onLoad = () => memory.load();
      persistence.onToggle = async taskId => {
        await gate.promise;
        return memory.toggleCompletion(taskId);
      };
      const store = newAppStore(persistence);
      await store.dispatch(loadTasks());
      await store.settled();

      now = new Date('2024-05-03T09:15:00.000Z');
      await store.dispatch(toggleCompletion(1));
      expect(store.state.tasks[0].completed).to.be.true;
      expect(store.state.tasks[0].modifiedAt).to.equal(
        '2024-05-01T10:00:00.000Z'
      );

      gate.resolve();
      await store.settled();
      expect(store.state.tasks[0].completed).to.be.true;
      expect(store.state.tasks[0].modifiedAt).to.equal(
        '2024-05-03T09:15:00.000Z'
      );
    });

    it('should report toggling a missing task', async () => {
      const store = newAppStore(new MemoryTaskStore());

      await store.dispatch(toggleCompletion(7));
      await store.settled();

      expect(store.state.error).to.equal('Task with ID 7 not found');
    });

    it('should not lose dispatches made while the collaborator works', async () => {
      const persistence = new StubPersistence();
      const toggled = deferred<TaskResult>();
      persistence.onToggle = () => toggled.promise;
      const store = newAppStore(persistence);
      await store.dispatch(tasksLoaded([makeTask(1), makeTask(2)]));

      await store.dispatch(toggleCompletion(1));
      await store.dispatch(selectTask(2));
      await store.dispatch(setTheme('light'));
      toggled.resolve(
        makeTask(1, { completed: true, modifiedAt: '2024-06-01T00:00:00.000Z' })
      );
      await store.settled();

      expect(persistence.calls).to.deep.equal(['toggleCompletion 1']);
      expect(store.state.currentTaskId).to.equal(2);
      expect(store.state.theme).to.equal('light');
      expect(store.state.tasks[0]).to.deep.equal(
        makeTask(1, { completed: true, modifiedAt: '2024-06-01T00:00:00.000Z' })
      );
      expect(store.state.tasks[1]).to.deep.equal(makeTask(2));
    });
  });

  describe('failureToError', () => {
    it('should map failure codes to error classes', () => {
      expect(
        failureToError({ error: 'bad title', code: 'validation' })
      ).to.be.instanceOf(ValidationError);
      expect(
        failureToError({ error: 'gone', code: 'not_found' })
      ).to.be.instanceOf(NotFoundError);
      const err = failureToError({ error: 'locked', code: 'persistence' });
      expect(err).to.be.instanceOf(PersistenceError);
      expect(err.message).to.equal('locked');
    });
  });
});
