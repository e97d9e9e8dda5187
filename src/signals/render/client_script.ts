// Browser-side behaviour shipped verbatim in every page: notification toggle,
// haptics, simulated price ticking, chart bootstrap, service worker.
export const CLIENT_SCRIPT = `function vibrate(duration) {
  if ('vibrate' in navigator) {
    navigator.vibrate(duration || 10);
  }
}

function toggleNotify(element) {
  element.classList.toggle('on');
  vibrate();
}

function updatePrice() {
  var priceEl = document.querySelector('.price');
  var changeEl = document.querySelector('.change');
  if (!priceEl) return;
  var current = parseFloat(priceEl.textContent.replace('$', '').replace(/,/g, ''));
  var next = current + (Math.random() - 0.5) * 0.02 * current;
  priceEl.textContent = '$' + next.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
  if (changeEl) {
    var percent = (Math.random() - 0.4) * 5;
    changeEl.textContent = (percent > 0 ? '+' : '') + percent.toFixed(1) + '%';
    changeEl.className = 'change ' + (percent > 0 ? 'positive' : 'negative');
  }
}

function mountCharts() {
  if (typeof Chart === 'undefined') return;
  document.querySelectorAll('script[data-chart-for]').forEach(function (node) {
    var canvas = document.getElementById(node.getAttribute('data-chart-for'));
    if (!canvas) return;
    new Chart(canvas.getContext('2d'), JSON.parse(node.textContent));
  });
}

document.addEventListener('DOMContentLoaded', function () {
  mountCharts();
  setInterval(updatePrice, 5000);
  document.querySelectorAll('.haptic').forEach(function (el) {
    el.addEventListener('click', function () { vibrate(); });
  });
});

if ('serviceWorker' in navigator) {
  navigator.serviceWorker.register('/sw.js').catch(function () {});
}`;
