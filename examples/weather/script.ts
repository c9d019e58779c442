import {
  bindViewLink,
  createDomRenderer,
  createViewController,
  createViewRegistry,
  createViewState,
  defineLayout,
  defineView,
  reportError,
  toNodes,
  type DomOutput,
  type ModalComponent,
  type ParameterInit,
  type ViewDefinition,
} from '../../src/index.js';

// ============================================
// Views
// ============================================
const Home = defineView<DomOutput>({
  name: 'HomeView',
  create: () => paragraph('Pick a forecast from the menu.'),
});

const Forecast = defineView<DomOutput>({
  name: 'WeatherForecastViewerView',
  create: (params, { state }) => {
    const id = typeof params.ID === 'number' ? params.ID : 1;
    const note = state.getField('Note');
    const nodes: Node[] = [paragraph(`Forecast #${id}`)];
    if (typeof note === 'string') nodes.push(paragraph(`Note: ${note}`));
    return nodes;
  },
});

const ConfirmDiscard: ModalComponent<DomOutput, boolean> = {
  name: 'ConfirmDiscard',
  create: (_params, modal) => {
    const yes = button('Discard', () => modal.close(true));
    const no = button('Keep editing', () => modal.cancel());
    return [paragraph('Discard unsaved changes?'), yes, no];
  },
};

const Editor = defineView<DomOutput>({
  name: 'ForecastEditorView',
  create: (_params, { navigator }) => {
    const input = document.createElement('textarea');
    input.addEventListener('input', () => {
      if (input.value) controller.lock();
      else controller.unlock();
    });

    const leave = button('Leave', () => {
      if (!controller.isLocked()) {
        navigator.loadView(createViewState(Home));
        return;
      }
      navigator
        .showModal(ConfirmDiscard, { title: 'Unsaved changes' })
        .then((result) => {
          if (result.cancelled) return;
          controller.unlock();
          navigator.loadView(createViewState(Home));
        })
        .catch((error: unknown) => reportError(error, 'discard dialog'));
    });

    return [input, leave];
  },
});

// ============================================
// Layout
// ============================================
const AppShell = defineLayout<DomOutput>({
  name: 'AppShell',
  render: (child, { navigator }) => {
    const nav = document.createElement('nav');
    const link = (label: string, view: ViewDefinition<DomOutput>, parameters: ParameterInit = {}) => {
      const anchor = document.createElement('a');
      anchor.textContent = label;
      bindViewLink(anchor, { navigator, view, parameters });
      return anchor;
    };
    nav.append(link('Home', Home), link('Forecast 5', Forecast, { ID: 5 }), link('Editor', Editor));

    const main = document.createElement('main');
    main.append(...toNodes(child));
    return [nav, main];
  },
});

// ============================================
// Wiring
// ============================================
const registry = createViewRegistry<DomOutput>({
  views: [Home, Forecast, Editor],
  defaultLayout: AppShell,
});

const outlet = document.getElementById('app');
if (!outlet) throw new Error('#app element not found');

const controller = createViewController<DomOutput>({
  registry,
  renderer: createDomRenderer({ outlet }),
  defaultView: Home,
  fallback: (failure) => paragraph(`Nothing to show (${failure.reason}).`),
  onNavigate: () => {
    const link = controller.toQueryString({ includeFields: false });
    if (link) document.title = `Weather ${link}`;
  },
});

controller.restoreFromQueryString(window.location.search);

function paragraph(text: string): HTMLParagraphElement {
  const el = document.createElement('p');
  el.textContent = text;
  return el;
}

function button(label: string, onClick: () => void): HTMLButtonElement {
  const el = document.createElement('button');
  el.type = 'button';
  el.textContent = label;
  el.addEventListener('click', onClick);
  return el;
}
